import { queryRows, withIsolatedClient } from '../config/database.js';
import { DataSourceError } from '../middleware/errorHandler.js';
import { renderAggregateQuery, type AggregateQueryShape } from '../pipeline/query-builder.js';
import { logger } from '../utils/logger.js';
import { cacheService } from './cache.service.js';
import type { Aggregate } from '../types/index.js';

// score/upvotes/downvotes are bigint columns, which pg hands back as strings.
interface AggregateRow {
  score: string | number;
  upvotes: string | number;
  downvotes: string | number;
}

const EMPTY_AGGREGATE: Readonly<Aggregate> = Object.freeze({ totalScore: 0, upvotes: 0, downvotes: 0 });

function toCount(value: string | number): number {
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : 0;
}

export const aggregateService = {
  /**
   * Score totals for one object. Runs on its own connection so it can be in
   * flight at the same time as the ledger read on the shared pool.
   */
  async fetchAggregate(shape: AggregateQueryShape, identity: number, signal?: AbortSignal): Promise<Aggregate> {
    const cached = await cacheService.aggregates.getOrCompute({ shape, identity }, async () => {
      let rows: AggregateRow[];
      try {
        rows = await withIsolatedClient(
          (client) => queryRows<AggregateRow>(client, renderAggregateQuery(shape), [identity]),
          signal,
        );
      } catch (err) {
        if (signal?.aborted) throw signal.reason;
        logger.error({ err, identity, kind: shape.kind }, 'Aggregate read failed');
        throw new DataSourceError('Failed to read vote aggregates', err);
      }

      const [row] = rows;
      if (!row) return EMPTY_AGGREGATE;

      return Object.freeze({
        totalScore: toCount(row.score),
        upvotes: toCount(row.upvotes),
        downvotes: toCount(row.downvotes),
      });
    });

    return { ...cached };
  },
};
