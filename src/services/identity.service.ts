import { pool, queryRows } from '../config/database.js';
import { DataSourceError, NotFoundError } from '../middleware/errorHandler.js';
import { renderIdentityQuery } from '../pipeline/query-builder.js';
import { raceAbort, isAbortError } from '../utils/abort.js';
import { logger } from '../utils/logger.js';
import { cacheService } from './cache.service.js';
import type { ObjectKind } from '../types/index.js';

interface IdentityRow {
  id: number;
}

export const identityService = {
  /**
   * Local primary key of the post or comment whose `ap_id` is `url`.
   * Unknown URLs throw NotFoundError and are not remembered, so a later
   * lookup hits the database again.
   */
  async resolve(url: string, kind: ObjectKind, signal?: AbortSignal): Promise<number> {
    return cacheService.identities.getOrCompute({ url, kind }, async () => {
      let rows: IdentityRow[];
      try {
        rows = await raceAbort(
          queryRows<IdentityRow>(pool, renderIdentityQuery(kind), [url]),
          signal,
          'identity',
        );
      } catch (err) {
        if (isAbortError(err, signal)) throw err;
        logger.error({ err, url, kind }, 'Identity lookup failed');
        throw new DataSourceError('Failed to resolve the object URL', err);
      }

      const [row] = rows;
      if (!row) {
        throw new NotFoundError();
      }
      return row.id;
    });
  },

  invalidate(url: string, kind: ObjectKind): boolean {
    return cacheService.identities.delete({ url, kind });
  },
};
