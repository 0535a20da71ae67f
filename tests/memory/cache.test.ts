import { describe, it, expect, vi } from 'vitest';

import { EphemeralCache } from '../../src/memory/cache.js';

function clockedCache(start = 1_000) {
  let now = start;
  const cache = new EphemeralCache<string>({ now: () => now });
  return {
    cache,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('EphemeralCache', () => {
  it('serves an entry only until it expires', () => {
    const { cache, advance } = clockedCache();
    cache.put('pairs:abc', 'value', 100);

    advance(99);
    expect(cache.get('pairs:abc')).toBe('value');

    advance(1);
    expect(cache.get('pairs:abc')).toBeUndefined();
    expect(cache.has('pairs:abc')).toBe(false);
  });

  it('evicts expired entries on the sweeper interval', () => {
    vi.useFakeTimers();
    try {
      const { cache, advance } = clockedCache();
      cache.put('boosts:latest', 'value', 100);
      advance(200);
      expect(cache.stats()).toMatchObject({ entries: 0, expired: 1 });

      cache.startSweeper(5_000);
      vi.advanceTimersByTime(5_000);
      expect(cache.stats()).toMatchObject({ entries: 0, expired: 0 });

      cache.stopSweeper();
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it('clears one key or everything', () => {
    const { cache } = clockedCache();
    cache.put('a', '1', 1000);
    cache.put('b', '2', 1000);

    cache.clear('a');
    expect(cache.has('a')).toBe(false);
    expect(cache.has('b')).toBe(true);

    cache.clear();
    expect(cache.stats().entries).toBe(0);
  });

  it('sweeps expired entries and reports stats', () => {
    const { cache, advance } = clockedCache();
    cache.put('short', 'x', 10);
    cache.put('long', 'y', 1000);
    advance(50);

    expect(cache.stats()).toEqual({ entries: 1, expired: 1, hits: 0, misses: 0 });
    expect(cache.sweep()).toBe(1);
    expect(cache.stats().expired).toBe(0);

    cache.get('long');
    cache.get('missing');
    expect(cache.stats()).toMatchObject({ hits: 1, misses: 1 });
  });

  it('remembers loader results and does not cache rejections', async () => {
    const { cache, advance } = clockedCache();
    const loader = vi.fn(async () => 'loaded');

    await expect(cache.remember('k', 100, loader)).resolves.toBe('loaded');
    await expect(cache.remember('k', 100, loader)).resolves.toBe('loaded');
    expect(loader).toHaveBeenCalledTimes(1);

    advance(100);
    await cache.remember('k', 100, loader);
    expect(loader).toHaveBeenCalledTimes(2);

    const failing = vi.fn(async (): Promise<string> => {
      throw new Error('upstream down');
    });
    await expect(cache.remember('bad', 100, failing)).rejects.toThrow('upstream down');
    expect(cache.has('bad')).toBe(false);
  });
});
