/**
 * Webhook Front Door Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { TELEGRAM_IP_RANGES } from '~/config/constants'
import { TenantRuntimeError } from '~/core/errors'
import {
    buildBlockList,
    handleWebhookRequest,
    isAllowedSource,
    type WebhookGateOptions,
} from '~/server/webhookHandler'
import { FakeRuntime } from '../../utils/FakeRuntimeFactory'

const DISPATCHER = '100000:dispatcher-test-token'
const TENANT = '200000:tenant-test-token'
const TELEGRAM_IP = '149.154.167.220'

describe('isAllowedSource', () => {
    const ranges = buildBlockList(TELEGRAM_IP_RANGES)

    it('should accept Telegram addresses, plain or IPv4-mapped', () => {
        expect(isAllowedSource(ranges, TELEGRAM_IP)).toBe(true)
        expect(isAllowedSource(ranges, `::ffff:${TELEGRAM_IP}`)).toBe(true)
        expect(isAllowedSource(ranges, '2001:67c:4e8::1')).toBe(true)
    })

    it('should reject other or missing addresses', () => {
        expect(isAllowedSource(ranges, '203.0.113.5')).toBe(false)
        expect(isAllowedSource(ranges, undefined)).toBe(false)
        expect(isAllowedSource(ranges, 'not-an-ip')).toBe(false)
    })
})

describe('handleWebhookRequest', () => {
    let runtime: FakeRuntime
    let gate: WebhookGateOptions
    const request = (overrides: Partial<Parameters<typeof handleWebhookRequest>[0]> = {}) => ({
        token: TENANT,
        clientIp: TELEGRAM_IP,
        secretHeader: 'test-secret',
        body: { update_id: 1 },
        ...overrides,
    })

    beforeEach(() => {
        runtime = new FakeRuntime(TENANT)
        gate = {
            dispatcherToken: DISPATCHER,
            secretToken: 'test-secret',
            allowedSources: buildBlockList(TELEGRAM_IP_RANGES),
            runtimes: {
                has: vi.fn(() => false),
                getOrCreateRuntime: vi.fn(async () => runtime),
            },
            tenants: {
                isRegisteredTenant: vi.fn(async (token: string) => token === TENANT),
            },
        }
    })

    it('should queue the update for a registered tenant', async () => {
        const result = await handleWebhookRequest(request(), gate)

        expect(result).toEqual({ httpStatus: 200, body: { status: 'ok' } })
        expect(runtime.received).toEqual([{ update_id: 1 }])
    })

    it('should reject sources outside Telegram ranges', async () => {
        const result = await handleWebhookRequest(request({ clientIp: '203.0.113.5' }), gate)

        expect(result.httpStatus).toBe(403)
        expect(gate.runtimes.getOrCreateRuntime).not.toHaveBeenCalled()
    })

    it('should skip the source check when disabled', async () => {
        const result = await handleWebhookRequest(request({ clientIp: '127.0.0.1' }), { ...gate, allowedSources: null })

        expect(result.httpStatus).toBe(200)
    })

    it('should reject a wrong or missing secret', async () => {
        expect((await handleWebhookRequest(request({ secretHeader: 'wrong' }), gate)).httpStatus).toBe(403)
        expect((await handleWebhookRequest(request({ secretHeader: undefined }), gate)).httpStatus).toBe(403)
    })

    it('should answer 404 for unknown tokens', async () => {
        const result = await handleWebhookRequest(request({ token: '300000:unknown' }), gate)

        expect(result).toEqual({ httpStatus: 404, body: { status: 'error', message: 'Unknown bot' } })
    })

    it('should accept the dispatcher without a registration', async () => {
        const result = await handleWebhookRequest(request({ token: DISPATCHER }), gate)

        expect(result.httpStatus).toBe(200)
        expect(gate.tenants.isRegisteredTenant).not.toHaveBeenCalled()
    })

    it('should reject a body that is not an update', async () => {
        const result = await handleWebhookRequest(request({ body: { hello: 'world' } }), gate)

        expect(result.httpStatus).toBe(400)
    })

    it('should report runtime creation failures', async () => {
        gate.runtimes.getOrCreateRuntime = vi.fn(async () => {
            throw new TenantRuntimeError('getMe failed: Unauthorized', 'CREATION_FAILED')
        })

        const result = await handleWebhookRequest(request(), gate)

        expect(result).toEqual({
            httpStatus: 500,
            body: { status: 'error', message: 'Bot creation failed: getMe failed: Unauthorized' },
        })
    })

    it('should report an overloaded queue', async () => {
        await runtime.stop()

        const result = await handleWebhookRequest(request(), gate)

        expect(result).toEqual({ httpStatus: 503, body: { status: 'error', message: 'Queue overloaded' } })
    })
})
