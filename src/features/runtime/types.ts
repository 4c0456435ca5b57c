import type { Update } from 'telegraf/types'
import type { BotIdentity, TenantContext } from '~/core/types/telegram'
import type { InboundUpdate } from './utils/updateMapper'

export type RuntimeKind = 'dispatcher' | 'tenant'

/**
 * Handles one normalized update for one bot
 */
export type UpdateRoute = (update: InboundUpdate, ctx: TenantContext) => Promise<void>

export interface RouteTable {
    dispatcher: UpdateRoute
    tenant: UpdateRoute
}

/**
 * Live message-processing instance bound to one tenant's webhook
 */
export interface TenantRuntime {
    readonly token: string
    readonly kind: RuntimeKind
    readonly identity: BotIdentity
    readonly isStopped: boolean
    /** Queue an update; false when the queue is full or the runtime is stopped */
    enqueue(update: Update): boolean
    /** Refuse new updates and wait for queued ones; rejects with ALREADY_STOPPED on a second call */
    stop(): Promise<void>
}

export interface RuntimeFactory {
    create(token: string): Promise<TenantRuntime>
    /** Remove the platform-side webhook for a token, whether or not a runtime is live */
    releaseWebhook(token: string): Promise<void>
}
