export interface CacheEntry<T> {
  value: T;
  /** unix epoch milliseconds */
  expiresAt: number;
  /** unix epoch milliseconds */
  storedAt: number;
}

export type CacheLookup<T> = { found: true; value: T } | { found: false };

export interface Cache<T = unknown> {
  get(key: string): CacheLookup<T>;
  set(key: string, value: T): void;
}
