/**
 * Ephemeral Cache
 *
 * Process-wide TTL key/value store that sits in front of rate-limited
 * data sources. An entry is readable only while `now < expiresAt`; reads
 * check this themselves, the periodic sweep only bounds memory.
 */

export interface CacheEntry<V> {
  key: string;
  value: V;
  createdAt: number;
  expiresAt: number;
}

export interface CacheStats {
  entries: number;
  expired: number;
  hits: number;
  misses: number;
}

export interface EphemeralCacheOptions {
  /** Clock override, mostly for tests */
  now?: () => number;
}

export class EphemeralCache<V = unknown> {
  private entries = new Map<string, CacheEntry<V>>();
  private sweeper: NodeJS.Timeout | null = null;
  private hits = 0;
  private misses = 0;
  private readonly now: () => number;

  constructor(options: EphemeralCacheOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  put(key: string, value: V, ttlMs: number): void {
    const createdAt = this.now();
    this.entries.set(key, { key, value, createdAt, expiresAt: createdAt + ttlMs });
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    return entry.value;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && this.now() < entry.expiresAt;
  }

  /**
   * Remove one key, or everything when no key is given.
   */
  clear(key?: string): void {
    if (key === undefined) {
      this.entries.clear();
      return;
    }
    this.entries.delete(key);
  }

  /**
   * Evict expired entries. Returns how many were removed.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const now = this.now();
    let expired = 0;
    for (const entry of this.entries.values()) {
      if (now >= entry.expiresAt) expired += 1;
    }
    return {
      entries: this.entries.size - expired,
      expired,
      hits: this.hits,
      misses: this.misses,
    };
  }

  /**
   * Return the cached value for `key`, or run `loader` and cache its result.
   * Rejections are not cached.
   */
  async remember(key: string, ttlMs: number, loader: () => Promise<V>): Promise<V> {
    if (this.has(key)) {
      const cached = this.get(key);
      if (cached !== undefined) return cached;
    }
    this.misses += 1;
    const value = await loader();
    this.put(key, value, ttlMs);
    return value;
  }

  startSweeper(intervalMs: number): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      this.sweep();
    }, intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }
}

let shared: EphemeralCache | null = null;

/**
 * The process-wide cache shared by every data source.
 */
export function sharedCache(): EphemeralCache {
  if (!shared) {
    shared = new EphemeralCache();
  }
  return shared;
}

/** TTLs per data kind, in milliseconds. */
export const CACHE_TTL = {
  boosts: 300_000,
  pairs: 300_000,
  profiles: 600_000,
  search: 180_000,
  safety: 300_000,
  social: 600_000,
  quote: 10_000,
} as const;
