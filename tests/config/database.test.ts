import { describe, it, expect, vi, beforeEach } from 'vitest';

interface FakeClientHandle {
  options: unknown;
  connect: () => Promise<void>;
  end: () => Promise<void>;
  dropConnection: (err: Error) => void;
  listenerCount: (event: string) => number;
}

const { created, poolOptions } = vi.hoisted(() => ({
  created: new Array<FakeClientHandle>(),
  poolOptions: new Array<unknown>(),
}));

vi.mock('../../src/config/env.js', () => ({
  env: {
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    DATABASE_URL: 'postgres://lemmy@db.test:5432/lemmy',
    DATABASE_POOL_SIZE: 4,
    DATABASE_CONNECT_TIMEOUT_MS: 1_000,
    DATABASE_QUERY_TIMEOUT_MS: 2_000,
  },
}));

vi.mock('pg', async () => {
  const { EventEmitter } = await import('node:events');

  class Client extends EventEmitter {
    private rejectPending: ((err: Error) => void) | null = null;

    connect = vi.fn(async () => undefined);
    end = vi.fn(async () => {
      this.rejectPending?.(new Error('Connection terminated'));
    });
    query = vi.fn(
      () =>
        new Promise((_resolve, reject) => {
          this.rejectPending = reject;
        }),
    );

    constructor(readonly options: unknown) {
      super();
      created.push(this);
    }

    // What pg does when the socket is reset mid-query.
    dropConnection(err: Error) {
      this.rejectPending?.(err);
      this.emit('error', err);
    }
  }

  class Pool {
    on = vi.fn();
    end = vi.fn(async () => undefined);
    query = vi.fn();

    constructor(options: unknown) {
      poolOptions.push(options);
    }
  }

  return { default: { Client, Pool } };
});

import { withIsolatedClient } from '../../src/config/database.js';

const flushPromises = () => new Promise((resolve) => setImmediate(resolve));

describe('pool', () => {
  it('applies the connect and query timeouts', () => {
    expect(poolOptions).toEqual([
      {
        connectionString: 'postgres://lemmy@db.test:5432/lemmy',
        connectionTimeoutMillis: 1_000,
        query_timeout: 2_000,
        max: 4,
      },
    ]);
  });
});

describe('withIsolatedClient', () => {
  beforeEach(() => {
    created.length = 0;
  });

  it('returns the callback result and closes the connection', async () => {
    const result = await withIsolatedClient(async () => 'done');

    expect(result).toBe('done');
    expect(created).toHaveLength(1);
    expect(created[0].connect).toHaveBeenCalledTimes(1);
    expect(created[0].end).toHaveBeenCalledTimes(1);
  });

  it('applies the connect and query timeouts to the dedicated connection', async () => {
    await withIsolatedClient(async () => undefined);

    expect(created[0].options).toEqual({
      connectionString: 'postgres://lemmy@db.test:5432/lemmy',
      connectionTimeoutMillis: 1_000,
      query_timeout: 2_000,
    });
  });

  it('closes the connection when the callback throws', async () => {
    await expect(
      withIsolatedClient(async () => {
        throw new Error('syntax error at or near "SELEC"');
      }),
    ).rejects.toThrow('syntax error');

    expect(created[0].end).toHaveBeenCalledTimes(1);
  });

  it('closes the connection on abort, failing the query in flight', async () => {
    const controller = new AbortController();

    const pending = withIsolatedClient((client) => client.query('SELECT pg_sleep(60)'), controller.signal);
    await flushPromises();
    controller.abort(new Error('cancelled'));

    await expect(pending).rejects.toThrow('Connection terminated');
    expect(created[0].end).toHaveBeenCalledTimes(1);
  });

  it('rejects without an uncaught error event when the socket is reset mid-query', async () => {
    const pending = withIsolatedClient((client) => client.query('SELECT 1'));
    await flushPromises();

    expect(created[0].listenerCount('error')).toBe(1);
    expect(() => created[0].dropConnection(new Error('read ECONNRESET'))).not.toThrow();

    await expect(pending).rejects.toThrow('read ECONNRESET');
    expect(created[0].end).toHaveBeenCalledTimes(1);
  });

  it('never connects when the signal is already aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled early');
    controller.abort(reason);

    await expect(withIsolatedClient(async () => 'unreachable', controller.signal)).rejects.toBe(reason);
    expect(created).toHaveLength(0);
  });
});
