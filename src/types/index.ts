/** Which Lemmy table family a federated URL points into. */
export enum ObjectKind {
  Post = 'Post',
  Comment = 'Comment',
}

export enum VoteFilter {
  All = 'All',
  Upvotes = 'Upvotes',
  Downvotes = 'Downvotes',
}

export enum SortOption {
  DatetimeAsc = 'datetime_asc',
  DatetimeDesc = 'datetime_desc',
}

export type VoteScore = 1 | -1;

export interface Vote {
  readonly name: string;
  readonly score: VoteScore;
  readonly actorId: string;
  /** Unix seconds, fractional. */
  readonly createdUtc: number;
}

export interface Aggregate {
  totalScore: number;
  upvotes: number;
  downvotes: number;
}

/** A `*_like` row joined to its voter, as read from PostgreSQL. */
export interface VoteRow {
  readonly name: string;
  readonly score: number;
  readonly actor_id: string;
  readonly published: Date;
}

export interface VotesQuery {
  url: string;
  kind: ObjectKind;
  filter: VoteFilter;
  sort: SortOption;
  username?: string;
  signal?: AbortSignal;
}

export interface VotesResult {
  aggregate: Aggregate;
  votes: Vote[];
}

export interface VotesPage {
  votes: Vote[];
  totalCount: number;
  nextOffset: number | null;
  totalScore: number;
  upvotes: number;
  downvotes: number;
}

declare global {
  namespace Express {
    interface Request {
      id: string;
    }
  }
}
