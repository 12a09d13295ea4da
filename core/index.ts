/**
 * Core library entry point.
 *
 * Pure, synchronous modules with no runtime dependencies.
 */

// Semver - versions, ordering and ranges
export * from './semver/index.js'

// Errors - structured error types
export * from './errors/index.js'

// Cache - LRU cache for bounded memory usage
export type {
  CacheOptions,
  CacheStats,
} from './cache/index.js'
export { LRUCache } from './cache/index.js'
