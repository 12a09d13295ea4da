/**
 * Bounded LRU cache for parse results.
 *
 * Entries live in a Map whose insertion order doubles as recency order:
 * a hit re-inserts the entry at the end, so the first key is always the
 * least recently used one and is the one evicted on overflow.
 *
 * @module core/cache/lru
 */

export interface CacheOptions<K = string, V = unknown> {
  /**
   * Maximum number of entries kept.
   * @default 100
   */
  maxSize?: number

  /**
   * Called for every entry that leaves the cache (eviction, delete, clear).
   */
  onEvict?: (key: K, value: V) => void
}

export interface CacheStats {
  hits: number
  misses: number
  /** Entries dropped because the cache was full */
  evictions: number
  count: number
  /** Percentage 0-100, rounded */
  hitRate: number
}

/**
 * @example
 * ```typescript
 * const cache = new LRUCache<string, SemanticVersion | null>({ maxSize: 500 })
 *
 * cache.set('loose:1.0-beta', version)
 * cache.get('loose:1.0-beta')
 * ```
 */
export class LRUCache<K = string, V = unknown> {
  private entries: Map<K, { value: V }> = new Map()
  private _maxSize: number
  private _hits = 0
  private _misses = 0
  private _evictions = 0
  private _onEvict: ((key: K, value: V) => void) | undefined

  constructor(options?: CacheOptions<K, V>) {
    this._maxSize = options?.maxSize ?? 100
    this._onEvict = options?.onEvict
  }

  get size(): number {
    return this.entries.size
  }

  get maxSize(): number {
    return this._maxSize
  }

  /**
   * Looks up a key and marks it most recently used.
   */
  get(key: K): V | undefined {
    const entry = this.entries.get(key)
    if (!entry) {
      this._misses++
      return undefined
    }

    this.entries.delete(key)
    this.entries.set(key, entry)
    this._hits++

    return entry.value
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key)
    } else if (this.entries.size >= this._maxSize) {
      this.evictOldest()
    }

    this.entries.set(key, { value })
  }

  delete(key: K): boolean {
    const entry = this.entries.get(key)
    if (!entry) {
      return false
    }

    this.entries.delete(key)
    this._onEvict?.(key, entry.value)

    return true
  }

  /**
   * Does not touch recency.
   */
  has(key: K): boolean {
    return this.entries.has(key)
  }

  /**
   * Reads without touching recency.
   */
  peek(key: K): V | undefined {
    return this.entries.get(key)?.value
  }

  clear(): void {
    if (this._onEvict) {
      for (const [key, entry] of this.entries) {
        this._onEvict(key, entry.value)
      }
    }

    this.entries.clear()
  }

  /**
   * Keys from most to least recently used.
   */
  keys(): K[] {
    return [...this.entries.keys()].reverse()
  }

  resize(newMaxSize: number): void {
    this._maxSize = newMaxSize

    while (this.entries.size > newMaxSize) {
      this.evictOldest()
    }
  }

  getStats(): CacheStats {
    const total = this._hits + this._misses
    const hitRate = total === 0 ? 0 : Math.round((this._hits / total) * 100)

    return {
      hits: this._hits,
      misses: this._misses,
      evictions: this._evictions,
      count: this.entries.size,
      hitRate,
    }
  }

  resetStats(): void {
    this._hits = 0
    this._misses = 0
    this._evictions = 0
  }

  private evictOldest(): void {
    const oldest = this.entries.entries().next()
    if (oldest.done) {
      return
    }

    const [key, entry] = oldest.value
    this.entries.delete(key)
    this._evictions++
    this._onEvict?.(key, entry.value)
  }
}
