import express from 'express';
import cors from 'cors';
import { env } from './config/env.js';
import { requestId } from './middleware/requestId.js';
import { requestLogger } from './middleware/requestLogger.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import votesRoutes from './routes/votes.routes.js';

export function createApp() {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  app.use(requestId);
  app.use(requestLogger);
  app.use(cors({ origin: env.CORS_ORIGIN, exposedHeaders: ['X-Request-ID', 'Retry-After'] }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/votes', votesRoutes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
