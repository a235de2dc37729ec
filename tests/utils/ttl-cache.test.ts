import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TtlCache } from '../../src/utils/ttl-cache.js';

describe('TtlCache', () => {
  let clock: number;
  let cache: TtlCache<{ id: number }, string>;

  beforeEach(() => {
    clock = 1_000;
    cache = new TtlCache({
      name: 'test',
      ttlMs: 60_000,
      maxSize: 3,
      keyOf: ({ id }) => String(id),
      now: () => clock,
    });
  });

  describe('getOrCompute', () => {
    it('computes on a miss and serves the stored value before the TTL elapses', async () => {
      const compute = vi.fn().mockResolvedValue('first');

      expect(await cache.getOrCompute({ id: 1 }, compute)).toBe('first');
      clock += 59_999;
      expect(await cache.getOrCompute({ id: 1 }, compute)).toBe('first');

      expect(compute).toHaveBeenCalledTimes(1);
    });

    it('recomputes exactly once after the TTL elapses', async () => {
      const compute = vi.fn().mockResolvedValueOnce('stale').mockResolvedValueOnce('fresh');

      await cache.getOrCompute({ id: 1 }, compute);
      clock += 60_000;

      expect(await cache.getOrCompute({ id: 1 }, compute)).toBe('fresh');
      expect(await cache.getOrCompute({ id: 1 }, compute)).toBe('fresh');
      expect(compute).toHaveBeenCalledTimes(2);
    });

    it('does not store rejections', async () => {
      const compute = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('boom'))
        .mockResolvedValueOnce('ok');

      await expect(cache.getOrCompute({ id: 1 }, compute)).rejects.toThrow('boom');
      expect(cache.size).toBe(0);

      expect(await cache.getOrCompute({ id: 1 }, compute)).toBe('ok');
      expect(compute).toHaveBeenCalledTimes(2);
    });

    it('lets concurrent misses on the same key each compute', async () => {
      let calls = 0;
      const compute = async () => {
        const n = ++calls;
        await Promise.resolve();
        return `value-${n}`;
      };

      const results = await Promise.all([
        cache.getOrCompute({ id: 7 }, compute),
        cache.getOrCompute({ id: 7 }, compute),
      ]);

      expect(calls).toBe(2);
      expect(results).toEqual(['value-1', 'value-2']);
      expect(cache.get({ id: 7 })).toBe('value-2');
    });
  });

  describe('eviction', () => {
    it('evicts the least recently used entry when full', () => {
      cache.set({ id: 1 }, 'a');
      cache.set({ id: 2 }, 'b');
      cache.set({ id: 3 }, 'c');

      // touch 1 so 2 becomes the oldest
      expect(cache.get({ id: 1 })).toBe('a');
      cache.set({ id: 4 }, 'd');

      expect(cache.size).toBe(3);
      expect(cache.get({ id: 2 })).toBeUndefined();
      expect(cache.get({ id: 1 })).toBe('a');
      expect(cache.get({ id: 3 })).toBe('c');
      expect(cache.get({ id: 4 })).toBe('d');
    });

    it('replaces an existing key without evicting others', () => {
      cache.set({ id: 1 }, 'a');
      cache.set({ id: 2 }, 'b');
      cache.set({ id: 3 }, 'c');
      cache.set({ id: 2 }, 'b2');

      expect(cache.size).toBe(3);
      expect(cache.get({ id: 1 })).toBe('a');
      expect(cache.get({ id: 2 })).toBe('b2');
    });

    it('drops expired entries on read', () => {
      cache.set({ id: 1 }, 'a');
      clock += 60_000;

      expect(cache.has({ id: 1 })).toBe(false);
      expect(cache.size).toBe(0);
    });

    it('restarts the TTL when a key is overwritten', () => {
      cache.set({ id: 1 }, 'a');
      clock += 50_000;
      cache.set({ id: 1 }, 'b');
      clock += 50_000;

      expect(cache.get({ id: 1 })).toBe('b');
    });
  });

  it('deletes and clears entries', () => {
    cache.set({ id: 1 }, 'a');
    cache.set({ id: 2 }, 'b');

    expect(cache.delete({ id: 1 })).toBe(true);
    expect(cache.delete({ id: 1 })).toBe(false);
    cache.clear();

    expect(cache.size).toBe(0);
  });

  it('rejects a capacity below one', () => {
    expect(
      () => new TtlCache<string, string>({ name: 'bad', ttlMs: 1, maxSize: 0, keyOf: (k) => k }),
    ).toThrow(RangeError);
  });

  it('reads the system clock by default', async () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      const real = new TtlCache<string, number>({ name: 'clock', ttlMs: 1_000, maxSize: 2, keyOf: (k) => k });
      const compute = vi.fn().mockResolvedValue(1);

      await real.getOrCompute('k', compute);
      vi.advanceTimersByTime(999);
      await real.getOrCompute('k', compute);
      vi.advanceTimersByTime(1);
      await real.getOrCompute('k', compute);

      expect(compute).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});
