import type { Correlator } from '~/features/correlation/services/Correlator'
import type { AdminReplySessionStore } from '~/features/replies/stores/AdminReplySessionStore'
import type { EncryptedStore } from '~/features/storage/services/EncryptedStore'

/**
 * Names shown in the texts both kinds of bot send
 */
export interface Presentation {
    serviceName: string
    projectUrl: string
    /** Username of the dispatcher bot tenants were created through */
    creatorUsername: string
}

/**
 * Shared services every tenant flow runs against
 */
export interface RelayServices {
    store: EncryptedStore
    correlator: Correlator
    sessions: AdminReplySessionStore
    replyTimeoutMs: number
    presentation: Presentation
}
