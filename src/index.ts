import type { Server } from 'http';
import type { Worker } from 'bullmq';
import { createApp } from './app.js';
import { env } from './config/env.js';
import { closePool } from './config/database.js';
import { redis } from './config/redis.js';
import { closeQueues, scheduleInstanceRefresh, startWorkers } from './jobs/queues.js';
import { processInstanceRefresh } from './jobs/instances.job.js';
import { cacheService } from './services/cache.service.js';
import { federationService } from './services/federation.service.js';
import { instancesService } from './services/instances.service.js';
import { logger } from './utils/logger.js';

let server: Server | null = null;
let workers: Worker[] = [];

async function bootstrapAllowlist(): Promise<void> {
  if (!env.INSTANCE_ALLOWLIST_ENABLED) return;

  try {
    await processInstanceRefresh();
  } catch (err) {
    const known = await instancesService.count();
    if (known === 0) throw err;
    logger.warn({ err, known }, 'Instance list refresh failed, keeping the existing allowlist');
  }
}

async function start(): Promise<void> {
  await bootstrapAllowlist();

  if (env.UPSTREAM_VALIDATION_ENABLED) {
    await federationService.login();
  }

  workers = startWorkers();
  await scheduleInstanceRefresh();

  const app = createApp();
  server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server listening');
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');

  const httpServer = server;
  if (httpServer) {
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });
  }

  await Promise.all(workers.map((w) => w.close()));
  await closeQueues();
  await closePool();
  await redis.quit();
  cacheService.clearAll();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  });
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
