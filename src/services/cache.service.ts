import { env } from '../config/env.js';
import { TtlCache } from '../utils/ttl-cache.js';
import {
  aggregateShapeKey,
  ledgerShapeKey,
  type AggregateQueryShape,
  type VoteQueryShape,
} from '../pipeline/query-builder.js';
import type { Aggregate, ObjectKind, VoteRow } from '../types/index.js';

const TTL_MS = {
  IDENTITY: env.IDENTITY_CACHE_TTL_SECONDS * 1000,
  AGGREGATE: env.AGGREGATE_CACHE_TTL_SECONDS * 1000,
  VOTES: env.VOTES_CACHE_TTL_SECONDS * 1000,
};

export interface IdentityKey {
  url: string;
  kind: ObjectKind;
}

export interface AggregateKey {
  shape: AggregateQueryShape;
  identity: number;
}

export interface VotesKey {
  shape: VoteQueryShape;
  identity: number;
  /** Already case-folded. */
  author: string | null;
}

/**
 * Process-wide caches, one per pipeline stage. They start empty and are
 * never persisted or shared between instances.
 */
export const cacheService = {
  identities: new TtlCache<IdentityKey, number>({
    name: 'identity',
    ttlMs: TTL_MS.IDENTITY,
    maxSize: env.CACHE_MAX_ENTRIES,
    keyOf: ({ url, kind }) => `${kind}|${url}`,
  }),

  aggregates: new TtlCache<AggregateKey, Readonly<Aggregate>>({
    name: 'aggregate',
    ttlMs: TTL_MS.AGGREGATE,
    maxSize: env.CACHE_MAX_ENTRIES,
    keyOf: ({ shape, identity }) => `${aggregateShapeKey(shape)}|${identity}`,
  }),

  votes: new TtlCache<VotesKey, readonly VoteRow[]>({
    name: 'votes',
    ttlMs: TTL_MS.VOTES,
    maxSize: env.CACHE_MAX_ENTRIES,
    keyOf: ({ shape, identity, author }) => JSON.stringify([ledgerShapeKey(shape), identity, author]),
  }),

  clearAll() {
    this.identities.clear();
    this.aggregates.clear();
    this.votes.clear();
  },
};
