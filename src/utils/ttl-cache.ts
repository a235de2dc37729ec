import { logger } from './logger.js';

export interface TtlCacheOptions<K> {
  /** Used in log lines only. */
  name: string;
  ttlMs: number;
  maxSize: number;
  /** Serializes a key into the string the entries are stored under. */
  keyOf: (key: K) => string;
  now?: () => number;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

/**
 * In-process memoizing cache. Entries expire `ttlMs` after they were stored
 * and the least recently used entry is evicted once `maxSize` is reached.
 *
 * Concurrent misses on the same key are not coalesced: each caller runs its
 * own `compute`, and the last one to settle wins the slot. Rejections are
 * never stored.
 */
export class TtlCache<K, V> {
  // Map iteration order is insertion order; hits re-insert, so the first key is the LRU one.
  private readonly entries = new Map<string, Entry<V>>();
  private readonly now: () => number;

  constructor(private readonly options: TtlCacheOptions<K>) {
    if (options.maxSize < 1) {
      throw new RangeError(`Cache ${options.name}: maxSize must be at least 1`);
    }
    this.now = options.now ?? (() => Date.now());
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const storeKey = this.options.keyOf(key);
    const entry = this.entries.get(storeKey);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(storeKey);
      return undefined;
    }

    this.entries.delete(storeKey);
    this.entries.set(storeKey, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    const storeKey = this.options.keyOf(key);
    this.entries.delete(storeKey);

    while (this.entries.size >= this.options.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(storeKey, { value, expiresAt: this.now() + this.options.ttlMs });
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.entries.delete(this.options.keyOf(key));
  }

  clear(): void {
    this.entries.clear();
  }

  async getOrCompute(key: K, compute: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    logger.debug({ cache: this.options.name }, 'Cache miss');
    const value = await compute();
    this.set(key, value);
    return value;
  }
}
