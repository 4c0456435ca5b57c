/**
 * Tenant Runtime Manager
 *
 * Bounded LRU of live runtimes. Cache hits take no lock; a miss takes a per-token lock and
 * re-checks, so concurrent first deliveries for one tenant create a single runtime while
 * other tenants proceed untouched. A runtime enters the cache only after it was fully
 * created, so a failed creation leaves nothing behind.
 */

import { TenantRuntimeError } from '~/core/errors'
import { shortenToken } from '~/core/utils/helpers'
import { KeyedLock } from '~/core/utils/keyedLock'
import { LruCache } from '~/core/utils/lruCache'
import { loggers } from '~/core/utils/logger'
import type { RuntimeFactory, TenantRuntime } from '../types'

const logger = loggers.runtime

/**
 * Where registrations are deleted on revocation
 */
export interface TenantRegistry {
    removeTenant(token: string): Promise<boolean>
}

export interface TenantRuntimeManagerOptions {
    capacity: number
}

export interface RevokeResult {
    /** A live runtime was stopped */
    stopped: boolean
    /** The registration existed and was deleted */
    unregistered: boolean
}

export class TenantRuntimeManager {
    private readonly runtimes: LruCache<string, TenantRuntime>
    private readonly creationLocks = new KeyedLock<string>()
    private readonly teardowns = new Set<Promise<void>>()

    constructor(
        private readonly factory: RuntimeFactory,
        private readonly registry: TenantRegistry,
        options: TenantRuntimeManagerOptions
    ) {
        this.runtimes = new LruCache(options.capacity, (token, runtime) => {
            logger.info({ token: shortenToken(token) }, 'Evicting least recently used runtime')
            this.track(this.teardown(runtime, 'evicted'))
        })
    }

    get size(): number {
        return this.runtimes.size
    }

    get capacity(): number {
        return this.runtimes.capacity
    }

    has(token: string): boolean {
        return this.runtimes.has(token)
    }

    /**
     * Live runtime for a token, created on first use.
     *
     * @throws {TenantRuntimeError} CREATION_FAILED
     */
    async getOrCreateRuntime(token: string): Promise<TenantRuntime> {
        const live = this.runtimes.get(token)
        if (live) {
            return live
        }

        return this.creationLocks.runExclusive(token, async () => {
            const created = this.runtimes.get(token)
            if (created) {
                return created
            }

            let runtime: TenantRuntime
            try {
                runtime = await this.factory.create(token)
            } catch (error) {
                if (error instanceof TenantRuntimeError) throw error
                const detail = error instanceof Error ? error.message : String(error)
                throw new TenantRuntimeError(detail, 'CREATION_FAILED', error)
            }

            this.runtimes.set(token, runtime)
            logger.info({ token: shortenToken(token), bot: runtime.identity.username, size: this.size }, 'Runtime cached')
            return runtime
        })
    }

    /**
     * Stop a tenant for good: tear down its runtime, remove the webhook and delete the registration.
     * Runs under the token's creation lock, so a creation in flight finishes first and is torn down.
     * Webhook removal failures are logged so the registration is still deleted.
     */
    async revoke(token: string): Promise<RevokeResult> {
        return this.creationLocks.runExclusive(token, async () => {
            const runtime = this.runtimes.delete(token)
            if (runtime) {
                await this.teardown(runtime, 'revoked')
            }

            try {
                await this.factory.releaseWebhook(token)
            } catch (error) {
                logger.warn({ err: error, token: shortenToken(token) }, 'Failed to delete webhook during revocation')
            }

            const unregistered = await this.registry.removeTenant(token)
            logger.info({ token: shortenToken(token), stopped: runtime !== undefined, unregistered }, 'Tenant revoked')
            return { stopped: runtime !== undefined, unregistered }
        })
    }

    /**
     * Stop every live runtime; one failure never aborts the rest
     */
    async shutdown(): Promise<void> {
        const live = this.runtimes.drain()
        logger.info({ count: live.length }, 'Shutting down runtimes')
        await Promise.all(live.map(([, runtime]) => this.teardown(runtime, 'shutdown')))
        await Promise.all([...this.teardowns])
    }

    /**
     * Resolve once every in-flight eviction teardown has finished
     */
    async settled(): Promise<void> {
        await Promise.all([...this.teardowns])
    }

    private track(task: Promise<void>): void {
        this.teardowns.add(task)
        void task.finally(() => this.teardowns.delete(task))
    }

    private async teardown(runtime: TenantRuntime, reason: 'evicted' | 'revoked' | 'shutdown'): Promise<void> {
        const context = { bot: runtime.identity.username, reason }
        try {
            await runtime.stop()
        } catch (error) {
            if (error instanceof TenantRuntimeError && error.code === 'ALREADY_STOPPED') {
                logger.info(context, 'Runtime already stopped')
                return
            }
            logger.warn({ ...context, err: error }, 'Runtime teardown failed')
        }
    }
}
