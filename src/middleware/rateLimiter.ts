import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { redis } from '../config/redis.js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { AppError } from './errorHandler.js';

interface RateLimitOptions {
  prefix: string;
  windowMs: number;
  max: number;
}

type ExecResult = [error: Error | null, result: unknown][] | null;

function replyNumber(results: ExecResult, index: number): number {
  const reply = results?.[index];
  if (!reply) throw new Error('Rate limit transaction was discarded');
  const [err, value] = reply;
  if (err) throw err;
  if (typeof value !== 'number') throw new Error(`Unexpected rate limit reply: ${String(value)}`);
  return value;
}

/**
 * Fixed-window limiter keyed by client IP. Counters live in Redis so every
 * instance shares them; if Redis fails the request is let through.
 */
export function createRateLimiter({ prefix, windowMs, max }: RateLimitOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const key = `ratelimit:${prefix}:${req.ip ?? 'unknown'}`;

    const check = async () => {
      // The window's expiry is set in the same transaction that counts the hit.
      const results = await redis
        .multi()
        .set(key, 0, 'PX', windowMs, 'NX')
        .incr(key)
        .pttl(key)
        .exec();
      const count = replyNumber(results, 1);
      const ttl = replyNumber(results, 2);

      res.setHeader('X-RateLimit-Limit', max);
      res.setHeader('X-RateLimit-Remaining', Math.max(0, max - count));

      if (count > max) {
        const retryAfter = Math.ceil((ttl > 0 ? ttl : windowMs) / 1000);
        res.setHeader('Retry-After', retryAfter);
        return new AppError(429, 'RATE_LIMITED', `Too many requests, retry in ${retryAfter}s`);
      }
      return null;
    };

    check().then(
      (limited) => next(limited ?? undefined),
      (err: unknown) => {
        logger.warn({ err, key }, 'Rate limit check failed, allowing request');
        next();
      },
    );
  };
}

export const rateLimitGet = createRateLimiter({
  prefix: 'get',
  windowMs: 60_000,
  max: env.RATE_LIMIT_PER_MINUTE,
});
