import { pool, queryRows } from '../config/database.js';
import { DataSourceError } from '../middleware/errorHandler.js';
import { renderLedgerQuery, type VoteQueryShape } from '../pipeline/query-builder.js';
import { raceAbort, isAbortError } from '../utils/abort.js';
import { logger } from '../utils/logger.js';
import { cacheService } from './cache.service.js';
import type { VoteRow } from '../types/index.js';

export const ledgerService = {
  /**
   * Individual vote rows for one object, filtered and ordered as `shape`
   * says. The returned array and its rows are frozen cache entries.
   */
  async fetchVotes(
    shape: VoteQueryShape,
    identity: number,
    authorName?: string,
    signal?: AbortSignal,
  ): Promise<readonly VoteRow[]> {
    if (shape.matchAuthor !== (authorName !== undefined)) {
      throw new TypeError('authorName must be given exactly when the shape matches on author');
    }
    const author = authorName === undefined ? null : authorName.toLowerCase();

    return cacheService.votes.getOrCompute({ shape, identity, author }, async () => {
      const params: unknown[] = authorName === undefined ? [identity] : [identity, authorName];

      let rows: VoteRow[];
      try {
        rows = await raceAbort(queryRows<VoteRow>(pool, renderLedgerQuery(shape), params), signal, 'ledger');
      } catch (err) {
        if (isAbortError(err, signal)) throw err;
        logger.error({ err, identity, kind: shape.kind }, 'Vote ledger read failed');
        throw new DataSourceError('Failed to read votes', err);
      }

      return Object.freeze(rows.map((row) => Object.freeze({ ...row })));
    });
  },
};
