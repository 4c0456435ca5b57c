import type { TenantRuntime } from '~/features/runtime/types'
import type { RevokeResult } from '~/features/runtime/services/TenantRuntimeManager'
import type { Presentation } from '~/features/messaging/types'
import type { EncryptedStore } from '~/features/storage/services/EncryptedStore'

/**
 * Runtime operations the dispatcher drives
 */
export interface TenantLifecycle {
    has(token: string): boolean
    getOrCreateRuntime(token: string): Promise<TenantRuntime>
    revoke(token: string): Promise<RevokeResult>
}

export interface DispatcherServices {
    lifecycle: TenantLifecycle
    store: EncryptedStore
    presentation: Presentation
}
