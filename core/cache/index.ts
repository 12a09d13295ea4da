export { LRUCache, type CacheOptions, type CacheStats } from './lru'
