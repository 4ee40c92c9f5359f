/**
 * LRU Cache for Registry Documents
 *
 * Bounded least-recently-used cache so a long resolution session against
 * a large registry does not hold every package document in memory.
 * Recency is tracked through Map insertion order: a hit re-inserts the
 * entry, eviction removes the first key.
 *
 * @module core/cache/lru
 */

/**
 * Configuration options for the LRU cache.
 */
export interface CacheOptions {
  /**
   * Maximum number of entries in the cache.
   * @default 100
   */
  maxSize?: number
}

/**
 * Cache statistics for monitoring and debugging.
 */
export interface CacheStats {
  hits: number
  misses: number
  evictions: number
  /** Current number of entries in the cache */
  count: number
  /** Hit rate as percentage (0-100) */
  hitRate: number
}

/**
 * @example
 * ```typescript
 * const cache = new LRUCache<string, VersionMetadataMap>({ maxSize: 100 })
 *
 * cache.set('left-pad', versions)
 * const hit = cache.get('left-pad')
 * ```
 */
export class LRUCache<K, V> {
  private readonly entries: Map<K, V> = new Map()
  private readonly maxSize: number
  private hits = 0
  private misses = 0
  private evictions = 0

  constructor(options?: CacheOptions) {
    this.maxSize = Math.max(1, options?.maxSize ?? 100)
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * Look up a value and mark it most recently used.
   */
  get(key: K): V | undefined {
    if (!this.entries.has(key)) {
      this.misses++
      return undefined
    }

    const value = this.entries.get(key)
    this.entries.delete(key)
    if (value !== undefined) {
      this.entries.set(key, value)
    }
    this.hits++
    return value
  }

  /**
   * Insert or replace a value, evicting the least recently used entry
   * when full.
   */
  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key)
    } else if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next()
      if (!oldest.done) {
        this.entries.delete(oldest.value)
        this.evictions++
      }
    }
    this.entries.set(key, value)
  }

  has(key: K): boolean {
    return this.entries.has(key)
  }

  delete(key: K): boolean {
    return this.entries.delete(key)
  }

  clear(): void {
    this.entries.clear()
  }

  /**
   * Keys from least to most recently used.
   */
  keys(): K[] {
    return [...this.entries.keys()]
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      count: this.entries.size,
      hitRate: total === 0 ? 0 : Math.round((this.hits / total) * 100),
    }
  }
}
