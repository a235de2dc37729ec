import { Queue, Worker } from 'bullmq';
import { bullConnection } from '../config/redis.js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { processInstanceRefresh } from './instances.job.js';

const connection = bullConnection();

export const INSTANCE_REFRESH = 'instance-refresh';

export const queues = {
  [INSTANCE_REFRESH]: new Queue(INSTANCE_REFRESH, { connection }),
};

/** Registers the daily allowlist refresh; re-registering the same cron is a no-op. */
export async function scheduleInstanceRefresh() {
  const job = await queues[INSTANCE_REFRESH].add(
    INSTANCE_REFRESH,
    {},
    {
      repeat: { pattern: env.INSTANCE_REFRESH_CRON },
      attempts: 3,
      backoff: { type: 'exponential', delay: 60_000 },
      removeOnComplete: 10,
      removeOnFail: 100,
    },
  );

  logger.debug({ jobId: job.id, pattern: env.INSTANCE_REFRESH_CRON }, 'Instance refresh scheduled');
  return job;
}

export function startWorkers(): Worker[] {
  const worker = new Worker(INSTANCE_REFRESH, processInstanceRefresh, { connection });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, attempts: job?.attemptsMade, err }, 'Instance refresh failed');
  });
  worker.on('completed', (job, result) => {
    logger.debug({ jobId: job.id, result }, 'Instance refresh completed');
  });

  return [worker];
}

export async function closeQueues() {
  await Promise.all(Object.values(queues).map((q) => q.close()));
}
