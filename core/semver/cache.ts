/**
 * Parse caches shared by the version and range parsers.
 *
 * Parsed values are immutable, so one instance can be handed to every caller.
 * Failed parses are cached as null.
 */

import { LRUCache, type CacheStats } from '../cache/lru'
import type { SemanticVersion } from './parse'
import type { VersionRange } from './range'

export const DEFAULT_CACHE_SIZE = 500

export const versionCache = new LRUCache<string, SemanticVersion | null>({
  maxSize: DEFAULT_CACHE_SIZE,
})

export const rangeCache = new LRUCache<string, VersionRange | null>({
  maxSize: DEFAULT_CACHE_SIZE,
})

export interface SemverCacheStats {
  versions: CacheStats
  ranges: CacheStats
}

export function getCacheStats(): SemverCacheStats {
  return {
    versions: versionCache.getStats(),
    ranges: rangeCache.getStats(),
  }
}
