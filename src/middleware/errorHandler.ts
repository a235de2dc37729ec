import type { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/** The federated URL does not match any local post or comment. */
export class NotFoundError extends AppError {
  constructor(message = 'Could not fetch the object from the URL.') {
    super(404, 'NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/** PostgreSQL was unreachable or a read failed. */
export class DataSourceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(503, 'DATA_SOURCE_ERROR', message, undefined, { cause });
    this.name = 'DataSourceError';
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

/** The upstream federation API refused the URL or could not be reached. */
export class UpstreamError extends AppError {
  constructor(statusCode: number, message: string, code = 'UPSTREAM_ERROR', cause?: unknown) {
    super(statusCode, code, message, undefined, { cause });
    this.name = 'UpstreamError';
  }
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new AppError(404, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`));
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    const logLevel = err.statusCode >= 500 ? 'error' : 'warn';
    logger[logLevel](
      { requestId: req.id, code: err.code, statusCode: err.statusCode, err: err.statusCode >= 500 ? err : undefined },
      err.message,
    );

    res.status(err.statusCode).json({
      success: false,
      error: {
        code: err.code,
        message: err.message,
        ...(err.details !== undefined ? { details: err.details } : {}),
      },
    });
    return;
  }

  logger.error({ requestId: req.id, err }, 'Unhandled error');

  const message =
    env.NODE_ENV === 'production' || !(err instanceof Error) ? 'Internal server error' : err.message;

  res.status(500).json({
    success: false,
    error: { code: 'INTERNAL_ERROR', message },
  });
}
