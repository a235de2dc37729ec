import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import { env } from './env.js';
import { logger } from '../utils/logger.js';

const connectionConfig = {
  connectionString: env.DATABASE_URL,
  connectionTimeoutMillis: env.DATABASE_CONNECT_TIMEOUT_MS,
  query_timeout: env.DATABASE_QUERY_TIMEOUT_MS,
};

/**
 * Shared pool for identity and ledger reads. Each query checks out its own
 * connection, so concurrent requests never interleave on one socket.
 */
export const pool = new pg.Pool({
  ...connectionConfig,
  max: env.DATABASE_POOL_SIZE,
});

pool.on('error', (err: Error) => {
  logger.error({ err }, 'Idle PostgreSQL client error');
});

export async function closePool(): Promise<void> {
  await pool.end();
}

export interface Queryable {
  query<R extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
}

export async function queryRows<R extends QueryResultRow>(
  client: Queryable,
  text: string,
  params: unknown[] = [],
): Promise<R[]> {
  const result = await client.query<R>(text, params);
  return result.rows;
}

/**
 * Runs `fn` on a dedicated connection outside the pool. The connection is
 * closed on every exit path, and as soon as `signal` aborts, which also
 * fails any query still in flight on it.
 */
export async function withIsolatedClient<T>(
  fn: (client: Queryable) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  signal?.throwIfAborted();

  const client = new pg.Client(connectionConfig);
  // A dropped socket also emits 'error' after failing the query in flight.
  client.on('error', (err: Error) => {
    logger.warn({ err }, 'Isolated PostgreSQL client error');
  });
  let closed: Promise<void> | null = null;
  const close = (): Promise<void> => {
    closed ??= client.end().catch((err: unknown) => {
      logger.warn({ err }, 'Failed to close isolated PostgreSQL client');
    });
    return closed;
  };

  const onAbort = () => {
    void close();
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    await client.connect();
    signal?.throwIfAborted();
    return await fn(client);
  } finally {
    signal?.removeEventListener('abort', onAbort);
    await close();
  }
}
