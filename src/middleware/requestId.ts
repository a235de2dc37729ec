import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';

const MAX_REQUEST_ID_LENGTH = 128;

export function requestId(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get('x-request-id');
  req.id = incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : randomUUID();
  res.setHeader('X-Request-ID', req.id);
  next();
}
