/**
 * Query shapes for the vote ledger, aggregate and identity lookups.
 *
 * A shape is plain data describing one query; the SQL text is rendered from
 * it on demand. Shapes double as cache discriminators, so rendering must stay
 * deterministic: the same shape always yields byte-identical text.
 */

import { ObjectKind, SortOption, VoteFilter } from '../types/index.js';

interface TableFamily {
  object: string;
  likes: string;
  aggregates: string;
  foreignKey: string;
}

const TABLES: Record<ObjectKind, TableFamily> = {
  [ObjectKind.Post]: {
    object: 'public.post',
    likes: 'public.post_like',
    aggregates: 'public.post_aggregates',
    foreignKey: 'post_id',
  },
  [ObjectKind.Comment]: {
    object: 'public.comment',
    likes: 'public.comment_like',
    aggregates: 'public.comment_aggregates',
    foreignKey: 'comment_id',
  },
};

const FILTER_SCORE: Record<VoteFilter, number | null> = {
  [VoteFilter.All]: null,
  [VoteFilter.Upvotes]: 1,
  [VoteFilter.Downvotes]: -1,
};

const SORT_DIRECTION: Record<SortOption, 'ASC' | 'DESC'> = {
  [SortOption.DatetimeAsc]: 'ASC',
  [SortOption.DatetimeDesc]: 'DESC',
};

export interface VoteQueryShape {
  readonly kind: ObjectKind;
  readonly filter: VoteFilter;
  readonly sort: SortOption;
  /** Adds a case-insensitive voter-name predicate bound as `$2`. */
  readonly matchAuthor: boolean;
}

export interface AggregateQueryShape {
  readonly kind: ObjectKind;
}

export interface VoteQueries {
  ledger: VoteQueryShape;
  aggregate: AggregateQueryShape;
}

export function buildVoteQueries(
  kind: ObjectKind,
  filter: VoteFilter,
  sort: SortOption,
  hasAuthor: boolean,
): VoteQueries {
  return {
    ledger: { kind, filter, sort, matchAuthor: hasAuthor },
    aggregate: { kind },
  };
}

export function ledgerShapeKey(shape: VoteQueryShape): string {
  return `${shape.kind}|${shape.filter}|${shape.sort}|${shape.matchAuthor ? 'author' : 'any'}`;
}

export function aggregateShapeKey(shape: AggregateQueryShape): string {
  return shape.kind;
}

export function renderIdentityQuery(kind: ObjectKind): string {
  return `SELECT id FROM ${TABLES[kind].object} WHERE ap_id = $1`;
}

export function renderLedgerQuery(shape: VoteQueryShape): string {
  const { likes, foreignKey } = TABLES[shape.kind];
  const score = FILTER_SCORE[shape.filter];
  const direction = SORT_DIRECTION[shape.sort];

  const predicates = [`v.${foreignKey} = $1`];
  if (score !== null) {
    predicates.push(`v.score = ${score}`);
  }
  if (shape.matchAuthor) {
    predicates.push('lower(pe.name) = lower($2)');
  }

  return [
    'SELECT pe.name, v.score, pe.actor_id, v.published',
    `FROM ${likes} v`,
    'JOIN public.person pe ON v.person_id = pe.id',
    `WHERE ${predicates.join(' AND ')}`,
    `ORDER BY v.published ${direction}, pe.id ${direction}`,
  ].join('\n');
}

export function renderAggregateQuery(shape: AggregateQueryShape): string {
  const { aggregates, foreignKey } = TABLES[shape.kind];
  return [
    'SELECT agg.score, agg.upvotes, agg.downvotes',
    `FROM ${aggregates} agg`,
    `WHERE agg.${foreignKey} = $1`,
  ].join('\n');
}
