/**
 * LRU Cache Unit Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { LruCache } from '~/core/utils/lruCache'

describe('LruCache', () => {
    it('should reject a non-positive capacity', () => {
        expect(() => new LruCache<string, number>(0)).toThrow('LRU capacity must be a positive integer (got 0)')
    })

    it('should evict the least recently used entry past capacity', () => {
        const onEvict = vi.fn()
        const cache = new LruCache<string, number>(2, onEvict)

        cache.set('a', 1)
        cache.set('b', 2)
        cache.get('a')
        cache.set('c', 3)

        expect(cache.keys()).toEqual(['a', 'c'])
        expect(onEvict).toHaveBeenCalledOnce()
        expect(onEvict).toHaveBeenCalledWith('b', 2)
    })

    it('should not touch recency on peek', () => {
        const cache = new LruCache<string, number>(2)
        cache.set('a', 1)
        cache.set('b', 2)

        expect(cache.peek('a')).toBe(1)
        cache.set('c', 3)

        expect(cache.has('a')).toBe(false)
        expect(cache.keys()).toEqual(['b', 'c'])
    })

    it('should replace an existing key without evicting', () => {
        const onEvict = vi.fn()
        const cache = new LruCache<string, number>(2, onEvict)
        cache.set('a', 1)
        cache.set('b', 2)
        cache.set('a', 10)

        expect(cache.size).toBe(2)
        expect(cache.get('a')).toBe(10)
        expect(onEvict).not.toHaveBeenCalled()
    })

    it('should delete and drain without calling the eviction listener', () => {
        const onEvict = vi.fn()
        const cache = new LruCache<string, number>(3, onEvict)
        cache.set('a', 1)
        cache.set('b', 2)
        cache.set('c', 3)

        expect(cache.delete('b')).toBe(2)
        expect(cache.drain()).toEqual([
            ['a', 1],
            ['c', 3],
        ])
        expect(cache.size).toBe(0)
        expect(onEvict).not.toHaveBeenCalled()
    })
})
