/**
 * Webhook front door logic, kept free of HTTP framework types so it can be exercised directly.
 */

import { BlockList, isIPv4, isIPv6 } from 'net'
import { timingSafeEqual } from 'crypto'
import type { Update } from 'telegraf/types'
import { TenantRuntimeError } from '~/core/errors'
import { shortenToken } from '~/core/utils/helpers'
import { loggers } from '~/core/utils/logger'
import type { TenantRuntime } from '~/features/runtime/types'

const logger = loggers.server

export type WebhookReply = { status: 'ok' } | { status: 'error'; message: string }

export interface WebhookResult {
    httpStatus: number
    body: WebhookReply
}

export interface WebhookRequest {
    token: string
    clientIp?: string
    secretHeader?: string
    body: unknown
}

export interface WebhookGateOptions {
    dispatcherToken: string
    secretToken: string
    /** null disables the source address check */
    allowedSources: BlockList | null
    runtimes: {
        has(token: string): boolean
        getOrCreateRuntime(token: string): Promise<TenantRuntime>
    }
    tenants: {
        isRegisteredTenant(token: string): Promise<boolean>
    }
}

export function buildBlockList(ranges: readonly string[]): BlockList {
    const list = new BlockList()
    for (const range of ranges) {
        const [address, prefix] = range.split('/')
        list.addSubnet(address, Number(prefix), isIPv6(address) ? 'ipv6' : 'ipv4')
    }
    return list
}

/**
 * Whether an address (plain or IPv4-mapped IPv6) falls inside the allowed ranges
 */
export function isAllowedSource(list: BlockList, address: string | undefined): boolean {
    if (!address) return false
    const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(address)
    const candidate = mapped ? mapped[1] : address
    if (isIPv4(candidate)) return list.check(candidate, 'ipv4')
    if (isIPv6(candidate)) return list.check(candidate, 'ipv6')
    return false
}

function secretMatches(expected: string, received: string | undefined): boolean {
    if (received === undefined) return false
    const a = Buffer.from(expected)
    const b = Buffer.from(received)
    return a.length === b.length && timingSafeEqual(a, b)
}

export function isTelegramUpdate(body: unknown): body is Update {
    return typeof body === 'object' && body !== null && 'update_id' in body && typeof body.update_id === 'number'
}

const forbidden = (message: string): WebhookResult => ({ httpStatus: 403, body: { status: 'error', message } })

/**
 * Validate one webhook delivery and hand the update to its tenant runtime
 */
export async function handleWebhookRequest(request: WebhookRequest, gate: WebhookGateOptions): Promise<WebhookResult> {
    const { token } = request

    if (gate.allowedSources && !isAllowedSource(gate.allowedSources, request.clientIp)) {
        logger.warn({ ip: request.clientIp }, 'Webhook from outside Telegram ranges rejected')
        return forbidden('Forbidden source')
    }

    if (!secretMatches(gate.secretToken, request.secretHeader)) {
        logger.warn({ token: shortenToken(token) }, 'Webhook with invalid secret rejected')
        return forbidden('Invalid secret token')
    }

    const known =
        token === gate.dispatcherToken || gate.runtimes.has(token) || (await gate.tenants.isRegisteredTenant(token))
    if (!known) {
        return { httpStatus: 404, body: { status: 'error', message: 'Unknown bot' } }
    }

    if (!isTelegramUpdate(request.body)) {
        return { httpStatus: 400, body: { status: 'error', message: 'Malformed update' } }
    }

    let runtime: TenantRuntime
    try {
        runtime = await gate.runtimes.getOrCreateRuntime(token)
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error)
        logger.error({ err: error, token: shortenToken(token) }, 'Runtime unavailable for webhook')
        return { httpStatus: 500, body: { status: 'error', message: `Bot creation failed: ${detail}` } }
    }

    if (!runtime.enqueue(request.body)) {
        const overloaded = new TenantRuntimeError('Queue overloaded', 'OVERLOADED')
        logger.warn({ err: overloaded, token: shortenToken(token) }, 'Update rejected')
        return { httpStatus: 503, body: { status: 'error', message: 'Queue overloaded' } }
    }

    return { httpStatus: 200, body: { status: 'ok' } }
}
