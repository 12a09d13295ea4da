/**
 * LRU cache used for parsed versions and ranges
 */

import { describe, it, expect } from 'vitest'
import {
  LRUCache,
  type CacheStats,
} from '../../../core/cache'

describe('LRU Cache', () => {
  describe('Basic Operations', () => {
    it('should set and get a value', () => {
      const cache = new LRUCache<string, string>()

      cache.set('loose:1.0', '1.0.0.0')

      expect(cache.get('loose:1.0')).toBe('1.0.0.0')
    })

    it('should return undefined for missing keys', () => {
      const cache = new LRUCache<string, string>()

      expect(cache.get('nonexistent')).toBeUndefined()
    })

    it('should overwrite existing values', () => {
      const cache = new LRUCache<string, string>()

      cache.set('a', 'old')
      cache.set('a', 'new')

      expect(cache.get('a')).toBe('new')
      expect(cache.size).toBe(1)
    })

    it('should delete entries', () => {
      const cache = new LRUCache<string, string>()

      cache.set('a', '1')

      expect(cache.delete('a')).toBe(true)
      expect(cache.delete('a')).toBe(false)
      expect(cache.has('a')).toBe(false)
    })

    it('should clear all entries', () => {
      const cache = new LRUCache<string, string>()

      cache.set('a', '1')
      cache.set('b', '2')
      cache.clear()

      expect(cache.size).toBe(0)
      expect(cache.keys()).toEqual([])
    })
  })

  describe('Size Enforcement', () => {
    it('should evict oldest entry when max size is reached', () => {
      const cache = new LRUCache<string, string>({ maxSize: 3 })

      cache.set('a', '1')
      cache.set('b', '2')
      cache.set('c', '3')
      cache.set('d', '4') // Evicts 'a'

      expect(cache.get('a')).toBeUndefined()
      expect(cache.get('b')).toBe('2')
      expect(cache.get('d')).toBe('4')
      expect(cache.size).toBe(3)
    })

    it('should respect default max size of 100', () => {
      const cache = new LRUCache<string, string>()

      for (let i = 0; i < 150; i++) {
        cache.set(`1.${i}`, `value${i}`)
      }

      expect(cache.size).toBe(100)
      expect(cache.maxSize).toBe(100)
    })

    it('should evict down to a smaller size on resize', () => {
      const cache = new LRUCache<string, string>({ maxSize: 3 })

      cache.set('a', '1')
      cache.set('b', '2')
      cache.set('c', '3')
      cache.resize(1)

      expect(cache.size).toBe(1)
      expect(cache.maxSize).toBe(1)
      expect(cache.peek('c')).toBe('3')
    })
  })

  describe('LRU Eviction Policy', () => {
    it('should evict least recently USED entry (not just oldest)', () => {
      const cache = new LRUCache<string, string>({ maxSize: 3 })

      cache.set('a', '1')
      cache.set('b', '2')
      cache.set('c', '3')
      cache.get('a')
      cache.set('d', '4') // Evicts 'b'

      expect(cache.get('a')).toBe('1')
      expect(cache.get('b')).toBeUndefined()
    })

    it('should update LRU order on set of existing key', () => {
      const cache = new LRUCache<string, string>({ maxSize: 3 })

      cache.set('a', '1')
      cache.set('b', '2')
      cache.set('c', '3')
      cache.set('a', 'updated')
      cache.set('d', '4') // Evicts 'b'

      expect(cache.get('a')).toBe('updated')
      expect(cache.get('b')).toBeUndefined()
    })

    it('should not update LRU order on has() or peek()', () => {
      const cache = new LRUCache<string, string>({ maxSize: 2 })

      cache.set('a', '1')
      cache.set('b', '2')

      expect(cache.has('a')).toBe(true)
      expect(cache.peek('a')).toBe('1')
      cache.set('c', '3') // Evicts 'a'

      expect(cache.has('a')).toBe(false)
    })

    it('should return keys in LRU order (MRU first)', () => {
      const cache = new LRUCache<string, string>({ maxSize: 5 })

      cache.set('a', '1')
      cache.set('b', '2')
      cache.set('c', '3')
      cache.get('a')

      expect(cache.keys()).toEqual(['a', 'c', 'b'])
    })
  })

  describe('Cache Statistics', () => {
    it('should track hits, misses and evictions', () => {
      const cache = new LRUCache<string, string>({ maxSize: 1 })

      cache.set('a', '1')
      cache.get('a') // hit
      cache.get('x') // miss
      cache.set('b', '2') // evicts 'a'

      const stats: CacheStats = cache.getStats()
      expect(stats).toEqual({ hits: 1, misses: 1, evictions: 1, count: 1, hitRate: 50 })
    })

    it('should return 0 hit rate when no operations', () => {
      expect(new LRUCache().getStats().hitRate).toBe(0)
    })

    it('should reset stats without clearing data', () => {
      const cache = new LRUCache<string, string>()

      cache.set('a', '1')
      cache.get('a')
      cache.resetStats()

      expect(cache.getStats()).toEqual({ hits: 0, misses: 0, evictions: 0, count: 1, hitRate: 0 })
    })

    it('should not count delete or clear as evictions', () => {
      const cache = new LRUCache<string, string>()

      cache.set('a', '1')
      cache.set('b', '2')
      cache.delete('a')
      cache.clear()

      expect(cache.getStats().evictions).toBe(0)
    })
  })

  describe('Eviction Callback', () => {
    it('should call onEvict when item is evicted due to LRU', () => {
      const evicted: Array<{ key: string; value: string }> = []
      const cache = new LRUCache<string, string>({
        maxSize: 2,
        onEvict: (key, value) => {
          evicted.push({ key, value })
        },
      })

      cache.set('a', '1')
      cache.set('b', '2')
      cache.set('c', '3')

      expect(evicted).toEqual([{ key: 'a', value: '1' }])
    })

    it('should call onEvict on delete and clear', () => {
      const evicted: string[] = []
      const cache = new LRUCache<string, string>({
        onEvict: (key) => evicted.push(key),
      })

      cache.set('a', '1')
      cache.set('b', '2')
      cache.set('c', '3')
      cache.delete('a')
      cache.clear()

      expect(evicted).toEqual(['a', 'b', 'c'])
    })
  })

  describe('Edge Cases', () => {
    it('should distinguish cached null from a miss', () => {
      const cache = new LRUCache<string, string | null>()

      cache.set('strict:1.0', null)

      expect(cache.has('strict:1.0')).toBe(true)
      expect(cache.get('strict:1.0')).toBeNull()
      expect(cache.get('strict:2.0')).toBeUndefined()
    })

    it('should handle rapid set/get on same key', () => {
      const cache = new LRUCache<string, number>({ maxSize: 10 })

      for (let i = 0; i < 1000; i++) {
        cache.set('hot-key', i)
        expect(cache.get('hot-key')).toBe(i)
      }

      expect(cache.size).toBe(1)
    })
  })
})
