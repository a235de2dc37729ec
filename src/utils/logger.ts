import { pino } from 'pino';
import { env } from '../config/env.js';

export const logger = pino({
  name: 'fedivotes',
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
  base: { env: env.NODE_ENV },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: ['req.headers.authorization', 'password', 'jwt'],
});
