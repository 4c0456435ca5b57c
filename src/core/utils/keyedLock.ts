/**
 * Per-key async mutex.
 *
 * Callers for the same key run one at a time in arrival order; different keys never wait on
 * each other. Idle keys are dropped so the map only holds keys with work queued.
 */
export class KeyedLock<K = string> {
    private readonly tails = new Map<K, Promise<void>>()

    async runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve()

        let release: () => void = () => undefined
        const current = new Promise<void>((resolve) => {
            release = resolve
        })
        const tail = previous.then(() => current)
        this.tails.set(key, tail)

        await previous
        try {
            return await task()
        } finally {
            release()
            if (this.tails.get(key) === tail) {
                this.tails.delete(key)
            }
        }
    }

    isLocked(key: K): boolean {
        return this.tails.has(key)
    }

    get pendingKeys(): number {
        return this.tails.size
    }
}
