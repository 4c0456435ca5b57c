import { createFlowLogger } from '~/core/utils/logger'

const logger = createFlowLogger('update-queue')

export interface UpdateQueueOptions {
    /** Handlers running at the same time */
    concurrency: number
    /** Items waiting beyond the running ones before push() refuses */
    maxPending: number
}

/**
 * Bounded work queue for one tenant's updates.
 *
 * push() never blocks: it returns false once the pending limit is reached or the queue
 * is closed, and the caller answers "overloaded". Handler failures are logged per item.
 */
export class UpdateQueue<T> {
    private readonly pending: T[] = []
    private running = 0
    private closed = false
    private idleWaiters: Array<() => void> = []

    constructor(
        private readonly handler: (item: T) => Promise<void>,
        private readonly options: UpdateQueueOptions
    ) {}

    get size(): number {
        return this.pending.length
    }

    get active(): number {
        return this.running
    }

    get isClosed(): boolean {
        return this.closed
    }

    push(item: T): boolean {
        if (this.closed || this.pending.length >= this.options.maxPending) {
            return false
        }
        this.pending.push(item)
        this.pump()
        return true
    }

    /**
     * Resolve once nothing is pending or running
     */
    drain(): Promise<void> {
        if (this.running === 0 && this.pending.length === 0) {
            return Promise.resolve()
        }
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve)
        })
    }

    /**
     * Refuse new items and wait for the accepted ones to finish
     */
    async close(): Promise<void> {
        this.closed = true
        await this.drain()
    }

    private pump(): void {
        while (this.running < this.options.concurrency && this.pending.length > 0) {
            const item = this.pending.shift()
            if (item === undefined) break
            this.running++
            void this.run(item)
        }
    }

    private async run(item: T): Promise<void> {
        try {
            await this.handler(item)
        } catch (error) {
            logger.error({ err: error }, 'Queued update handler failed')
        } finally {
            this.running--
            this.pump()
            if (this.running === 0 && this.pending.length === 0) {
                const waiters = this.idleWaiters
                this.idleWaiters = []
                waiters.forEach((resolve) => resolve())
            }
        }
    }
}
