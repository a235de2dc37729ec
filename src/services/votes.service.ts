import { buildVoteQueries } from '../pipeline/query-builder.js';
import { logger } from '../utils/logger.js';
import { aggregateService } from './aggregate.service.js';
import { identityService } from './identity.service.js';
import { ledgerService } from './ledger.service.js';
import type { Vote, VoteRow, VotesQuery, VotesResult } from '../types/index.js';

function toVote(row: VoteRow): Vote {
  return {
    name: row.name,
    score: row.score > 0 ? 1 : -1,
    actorId: row.actor_id,
    createdUtc: row.published.getTime() / 1000,
  };
}

/**
 * Links a child controller to `parent` so aborting the parent aborts the
 * child. Returns a detach function for when the child is done.
 */
function linkAbort(parent: AbortSignal | undefined, child: AbortController): () => void {
  if (!parent) return () => undefined;
  if (parent.aborted) {
    child.abort(parent.reason);
    return () => undefined;
  }
  const onAbort = () => child.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}

export const votesService = {
  /**
   * Aggregate counts plus every vote matching the filter, in sort order.
   * Pagination is left to the caller.
   *
   * The aggregate and ledger reads start together and are joined; if either
   * fails the other is aborted and the whole call rejects.
   */
  async getVotes(query: VotesQuery): Promise<VotesResult> {
    const { url, kind, filter, sort, username, signal } = query;
    const shapes = buildVoteQueries(kind, filter, sort, username !== undefined);

    const identity = await identityService.resolve(url, kind, signal);

    const fanout = new AbortController();
    const detach = linkAbort(signal, fanout);
    const started = Date.now();

    try {
      const [aggregate, rows] = await Promise.all([
        aggregateService.fetchAggregate(shapes.aggregate, identity, fanout.signal),
        ledgerService.fetchVotes(shapes.ledger, identity, username, fanout.signal),
      ]);

      logger.debug(
        { identity, kind, filter, sort, count: rows.length, durationMs: Date.now() - started },
        'Votes fetched',
      );

      return { aggregate, votes: rows.map(toVote) };
    } catch (err) {
      fanout.abort(err);
      throw err;
    } finally {
      detach();
    }
  },
};
