/**
 * Platform transport failures, classified by what the caller should do about them.
 *
 * - forbidden: the recipient blocked the bot or kicked it, never retried
 * - bad_request: content cannot be delivered as-is (not copyable, entity errors), fall back to text
 * - not_found: chat or message is gone
 * - rate_limited / timeout / network: transient, retried only for idempotent setup calls
 */

import { ServiceError } from './ServiceError'

export type TransportErrorKind =
    | 'forbidden'
    | 'bad_request'
    | 'not_found'
    | 'rate_limited'
    | 'timeout'
    | 'network'
    | 'unknown'

const TRANSIENT_KINDS: ReadonlySet<TransportErrorKind> = new Set(['rate_limited', 'timeout', 'network'])

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'EHOSTUNREACH'])
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT'])

export class TransportError extends ServiceError {
    constructor(
        public readonly kind: TransportErrorKind,
        message: string,
        cause?: unknown
    ) {
        super('Transport', message, kind.toUpperCase(), cause, TRANSIENT_KINDS.has(kind))
    }

    get isTransient(): boolean {
        return TRANSIENT_KINDS.has(this.kind)
    }
}

function readProperty(value: unknown, key: string): unknown {
    if (value && typeof value === 'object' && key in value) {
        return Reflect.get(value, key)
    }
    return undefined
}

/**
 * Map a Telegram Bot API error (error_code + description) or a Node network error onto a kind
 */
export function classifyTransportError(error: unknown): TransportErrorKind {
    if (error instanceof TransportError) {
        return error.kind
    }

    // Telegraf's TelegramError exposes the Bot API error_code as `code`
    const status = readProperty(error, 'code')
    const description = String(readProperty(error, 'description') ?? readProperty(error, 'message') ?? '')
    const lowered = description.toLowerCase()

    if (typeof status === 'number') {
        if (status === 403) return 'forbidden'
        if (status === 429) return 'rate_limited'
        if (status === 400) {
            if (lowered.includes('not found')) return 'not_found'
            return 'bad_request'
        }
        if (status === 404) return 'not_found'
        if (status >= 500) return 'network'
        return 'unknown'
    }

    if (typeof status === 'string') {
        if (TIMEOUT_CODES.has(status)) return 'timeout'
        if (NETWORK_CODES.has(status)) return 'network'
    }

    const name = readProperty(error, 'name')
    if (name === 'AbortError' || name === 'TimeoutError') return 'timeout'
    if (name === 'FetchError') return 'network'

    return 'unknown'
}

/**
 * Wrap any thrown value in a TransportError, keeping the original as the cause
 */
export function toTransportError(error: unknown, operation: string): TransportError {
    if (error instanceof TransportError) {
        return error
    }
    const kind = classifyTransportError(error)
    const detail = error instanceof Error ? error.message : String(error)
    return new TransportError(kind, `${operation} failed: ${detail}`, error)
}
