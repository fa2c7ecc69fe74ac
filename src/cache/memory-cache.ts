import type { Cache, CacheEntry, CacheLookup } from "./types";

export interface TtlCacheOptions {
  /** Lifetime shared by every entry. Zero disables caching without disabling the store. */
  ttlSeconds: number;
  /** Clock in epoch milliseconds; injectable for tests. */
  now?: () => number;
}

const MISS = { found: false } as const;

/**
 * In-process cache with a single TTL for all entries.
 *
 * Every read and write is a synchronous map operation, so no critical section
 * ever spans an await: the event loop runs each one to completion before any
 * other caller touches the map. Concurrent writers to the same key race only
 * on which value wins, never on the map itself.
 */
export class TtlCache<T = unknown> implements Cache<T> {
  private readonly map = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: TtlCacheOptions) {
    if (!Number.isFinite(opts.ttlSeconds) || opts.ttlSeconds < 0) {
      throw new RangeError(`ttlSeconds must be a non-negative number (got ${opts.ttlSeconds})`);
    }
    this.ttlMs = opts.ttlSeconds * 1000;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Look up a live entry.
   * Side effect: an expired entry is evicted on the read that finds it.
   */
  get(key: string): CacheLookup<T> {
    const e = this.map.get(key);
    if (!e) return MISS;
    if (this.now() >= e.expiresAt) {
      this.map.delete(key);
      return MISS;
    }
    return { found: true, value: e.value };
  }

  set(key: string, value: T): void {
    const now = this.now();
    this.map.set(key, {
      value,
      storedAt: now,
      expiresAt: now + this.ttlMs,
    });
  }

  delete(key: string): boolean {
    return this.map.delete(key);
  }

  /** Stored entries, including expired ones not yet evicted. */
  get size(): number {
    return this.map.size;
  }
}
