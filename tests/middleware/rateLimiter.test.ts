import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import express from 'express';

const { transaction, redisMock } = vi.hoisted(() => {
  const transaction = {
    set: vi.fn(),
    incr: vi.fn(),
    pttl: vi.fn(),
    exec: vi.fn(),
  };
  transaction.set.mockReturnValue(transaction);
  transaction.incr.mockReturnValue(transaction);
  transaction.pttl.mockReturnValue(transaction);
  return { transaction, redisMock: { multi: vi.fn(() => transaction) } };
});

vi.mock('../../src/config/redis.js', () => ({ redis: redisMock }));
vi.mock('../../src/config/env.js', () => ({
  env: { NODE_ENV: 'test', LOG_LEVEL: 'silent', RATE_LIMIT_PER_MINUTE: 120 },
}));

import { createRateLimiter } from '../../src/middleware/rateLimiter.js';
import { errorHandler } from '../../src/middleware/errorHandler.js';

const app = express();
app.get('/limited', createRateLimiter({ prefix: 'test', windowMs: 60_000, max: 2 }), (_req, res) => {
  res.json({ success: true });
});
app.use(errorHandler);

function replies(count: number, ttl: number) {
  return [
    [null, count === 1 ? 'OK' : null],
    [null, count],
    [null, ttl],
  ];
}

describe('createRateLimiter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    transaction.exec.mockReset();
  });

  it('opens the window and counts the hit in one transaction', async () => {
    transaction.exec.mockResolvedValue(replies(1, 60_000));

    const response = await request(app).get('/limited');

    expect(response.status).toBe(200);
    expect(response.headers['x-ratelimit-limit']).toBe('2');
    expect(response.headers['x-ratelimit-remaining']).toBe('1');
    expect(redisMock.multi).toHaveBeenCalledTimes(1);

    const [key] = transaction.incr.mock.calls[0];
    expect(key).toMatch(/^ratelimit:test:/);
    expect(transaction.set).toHaveBeenCalledWith(key, 0, 'PX', 60_000, 'NX');
    expect(transaction.pttl).toHaveBeenCalledWith(key);
  });

  it('answers 429 with Retry-After once the budget is spent', async () => {
    transaction.exec.mockResolvedValue(replies(3, 12_345));

    const response = await request(app).get('/limited');

    expect(response.status).toBe(429);
    expect(response.headers['x-ratelimit-remaining']).toBe('0');
    expect(response.headers['retry-after']).toBe('13');
    expect(response.body).toEqual({
      success: false,
      error: { code: 'RATE_LIMITED', message: 'Too many requests, retry in 13s' },
    });
  });

  it('falls back to the full window when the key has no expiry', async () => {
    transaction.exec.mockResolvedValue(replies(5, -1));

    const response = await request(app).get('/limited');

    expect(response.status).toBe(429);
    expect(response.headers['retry-after']).toBe('60');
  });

  it('lets the request through when a command in the transaction fails', async () => {
    transaction.exec.mockResolvedValue([
      [null, 'OK'],
      [new Error('WRONGTYPE Operation against a key holding the wrong kind of value'), null],
      [null, 60_000],
    ]);

    const response = await request(app).get('/limited');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true });
  });

  it('lets requests through when Redis is down', async () => {
    transaction.exec.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const response = await request(app).get('/limited');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true });
  });
});
