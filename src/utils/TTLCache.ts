/**
 * Expiring cache for lookup results.
 * Entries expire ttlMs after they were stored and are only evicted when a
 * lookup finds them stale; there is no background sweep. With maxEntries > 0
 * the cache also evicts the least recently used entry when full.
 */

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export interface TTLCacheOptions {
  ttlMs: number;
  // 0 leaves the cache unbounded
  maxEntries?: number;
  now?: () => number;
}

export class TTLCache<T> {
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private cache: Map<string, CacheEntry<T>>;

  constructor({ ttlMs, maxEntries = 0, now = Date.now }: TTLCacheOptions) {
    this.ttlMs = ttlMs;
    this.maxEntries = maxEntries;
    this.now = now;
    this.cache = new Map();
  }

  get(key: string, ttlMs = this.ttlMs): T | undefined {
    return this.freshEntry(key, ttlMs)?.value;
  }

  set(key: string, value: T): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.maxEntries > 0 && this.cache.size >= this.maxEntries) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) {
        this.cache.delete(oldestKey);
      }
    }
    this.cache.set(key, { value, storedAt: this.now() });
  }

  /**
   * Returns the fresh cached value for key, or computes, stores and returns a
   * new one. Nothing is stored when compute throws.
   */
  getOrCompute(key: string, compute: () => T, ttlMs = this.ttlMs): T {
    const entry = this.freshEntry(key, ttlMs);
    if (entry) return entry.value;

    const value = compute();
    this.set(key, value);
    return value;
  }

  has(key: string): boolean {
    return this.freshEntry(key, this.ttlMs) !== undefined;
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }

  // Lazily evicts a stale entry; refreshes recency of a fresh one
  private freshEntry(key: string, ttlMs: number): CacheEntry<T> | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt > ttlMs) {
      this.cache.delete(key);
      return undefined;
    }

    if (this.maxEntries > 0) {
      // Move to end (most recently used)
      this.cache.delete(key);
      this.cache.set(key, entry);
    }
    return entry;
  }
}
