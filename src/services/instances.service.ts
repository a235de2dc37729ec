import { redis } from '../config/redis.js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';

export const INSTANCES_KEY = 'federation:instances';

export const instancesService = {
  /**
   * Whether `url` is an https URL on a known instance. With the allowlist
   * disabled only the scheme is checked.
   */
  async isAllowedUrl(url: string): Promise<boolean> {
    if (!url.startsWith('https://')) return false;

    let host: string;
    try {
      host = new URL(url).hostname.toLowerCase();
    } catch {
      return false;
    }

    if (!env.INSTANCE_ALLOWLIST_ENABLED) return true;

    return (await redis.sismember(INSTANCES_KEY, host)) === 1;
  },

  async addInstances(hosts: string[]): Promise<number> {
    if (hosts.length === 0) return 0;
    const added = await redis.sadd(INSTANCES_KEY, ...hosts);
    logger.debug({ added, total: hosts.length }, 'Instance allowlist updated');
    return added;
  },

  async count(): Promise<number> {
    return redis.scard(INSTANCES_KEY);
  },
};
