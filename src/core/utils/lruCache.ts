/**
 * Bounded least-recently-used map.
 *
 * Recency is tracked by Map insertion order: a hit deletes and re-inserts the key,
 * so the first key is always the eviction candidate.
 */

export type EvictionListener<K, V> = (key: K, value: V) => void

export class LruCache<K, V> {
    private readonly entries = new Map<K, V>()

    constructor(
        readonly capacity: number,
        private readonly onEvict?: EvictionListener<K, V>
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`LRU capacity must be a positive integer (got ${capacity})`)
        }
    }

    get size(): number {
        return this.entries.size
    }

    /** Read and mark as most recently used */
    get(key: K): V | undefined {
        if (!this.entries.has(key)) {
            return undefined
        }
        const value = this.entries.get(key)
        if (value !== undefined) {
            this.entries.delete(key)
            this.entries.set(key, value)
        }
        return value
    }

    /** Read without touching recency */
    peek(key: K): V | undefined {
        return this.entries.get(key)
    }

    has(key: K): boolean {
        return this.entries.has(key)
    }

    /**
     * Insert or replace. Inserting past capacity evicts the least recently used entry
     * and hands it to the eviction listener; replacing a key never evicts.
     */
    set(key: K, value: V): void {
        if (this.entries.has(key)) {
            this.entries.delete(key)
            this.entries.set(key, value)
            return
        }

        this.entries.set(key, value)

        while (this.entries.size > this.capacity) {
            const oldest = this.entries.entries().next()
            if (oldest.done) break
            const [oldestKey, oldestValue] = oldest.value
            this.entries.delete(oldestKey)
            this.onEvict?.(oldestKey, oldestValue)
        }
    }

    /** Remove without invoking the eviction listener */
    delete(key: K): V | undefined {
        const value = this.entries.get(key)
        this.entries.delete(key)
        return value
    }

    /** Remove every entry without invoking the eviction listener */
    drain(): Array<[K, V]> {
        const all = [...this.entries.entries()]
        this.entries.clear()
        return all
    }

    keys(): K[] {
        return [...this.entries.keys()]
    }

    clear(): void {
        this.entries.clear()
    }
}
