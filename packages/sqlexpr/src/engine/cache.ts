/**
 * LRU Cache
 *
 * A Map keeps insertion order, so re-inserting on access makes the first key
 * the least recently used one.
 *
 * @packageDocumentation
 */

/**
 * Statistics for the LRU cache
 */
export interface LRUCacheStats {
  /** Current number of entries in the cache */
  size: number;
  hits: number;
  misses: number;
  /** Entries dropped to make room */
  evictions: number;
  maxSize: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
}

/**
 * Least-recently-used cache with a fixed capacity. A capacity of 0 stores
 * nothing.
 *
 * @example
 * ```typescript
 * const cache = new LRUCache<string, Expression>(100);
 * cache.set('a + 1', ast);
 * cache.get('a + 1'); // ast
 * ```
 */
export class LRUCache<K, V> {
  private cache = new Map<K, V>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private maxSize: number) {}

  /**
   * Get a value, marking it most recently used
   */
  get(key: K): V | undefined {
    if (!this.cache.has(key)) {
      this.misses++;
      return undefined;
    }
    const value = this.cache.get(key);
    this.cache.delete(key);
    if (value !== undefined) {
      this.cache.set(key, value);
    }
    this.hits++;
    return value;
  }

  /**
   * Store a value, evicting the least recently used entries at capacity
   */
  set(key: K, value: V): void {
    if (this.maxSize === 0) {
      return;
    }

    this.cache.delete(key);
    this.evictTo(this.maxSize - 1);
    this.cache.set(key, value);
  }

  /**
   * Check for a key without touching its recency
   */
  has(key: K): boolean {
    return this.cache.has(key);
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Drop every entry and reset the counters
   */
  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  getStats(): LRUCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      maxSize: this.maxSize,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  /**
   * Change the capacity, evicting the oldest entries if it shrinks
   */
  resize(maxSize: number): void {
    this.maxSize = maxSize;
    this.evictTo(maxSize);
  }

  private evictTo(limit: number): void {
    while (this.cache.size > limit) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        return;
      }
      this.cache.delete(oldest.value);
      this.evictions++;
    }
  }
}
