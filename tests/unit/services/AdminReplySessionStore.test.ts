/**
 * Admin Reply Session Store Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { AdminReplySessionStore, type AdminReplyTarget } from '~/features/replies/stores/AdminReplySessionStore'

const TIMEOUT_MS = 60_000

const target: AdminReplyTarget = {
    targetUserId: 55,
    originalMessageId: 321,
    chatId: 7001,
    promptMessageId: 900,
    anchorMessageId: 800,
    language: 'en',
}

describe('AdminReplySessionStore', () => {
    let sessions: AdminReplySessionStore

    beforeEach(() => {
        vi.useFakeTimers()
        sessions = new AdminReplySessionStore(TIMEOUT_MS)
    })

    afterEach(() => {
        sessions.clearAll()
        vi.useRealTimers()
    })

    it('should keep one session per admin and bot', () => {
        const first = sessions.tryBegin(7001, 'tenant_bot', target)

        expect(first).not.toBeNull()
        expect(sessions.tryBegin(7001, 'Tenant_Bot', target)).toBeNull()
        expect(sessions.tryBegin(7001, 'other_bot', target)).not.toBeNull()
        expect(sessions.size()).toBe(2)
        expect(sessions.get(7001, 'TENANT_BOT')?.sessionId).toBe(first?.sessionId)
    })

    it('should expire after the timeout and call the handler once', async () => {
        const onTimeout = vi.fn()
        sessions.tryBegin(7001, 'tenant_bot', target, onTimeout)

        await vi.advanceTimersByTimeAsync(TIMEOUT_MS - 1)
        expect(sessions.exists(7001, 'tenant_bot')).toBe(true)

        await vi.advanceTimersByTimeAsync(1)
        expect(sessions.exists(7001, 'tenant_bot')).toBe(false)
        expect(onTimeout).toHaveBeenCalledOnce()
        expect(onTimeout).toHaveBeenCalledWith(expect.objectContaining({ adminId: 7001, promptMessageId: 900 }))
    })

    it('should not fire the timeout of a removed session', async () => {
        const onTimeout = vi.fn()
        sessions.tryBegin(7001, 'tenant_bot', target, onTimeout)

        expect(sessions.remove(7001, 'tenant_bot')).not.toBeNull()
        await vi.advanceTimersByTimeAsync(TIMEOUT_MS)

        expect(onTimeout).not.toHaveBeenCalled()
    })

    it('should not let an old timer end a newer session', async () => {
        const staleTimeout = vi.fn()
        const first = sessions.tryBegin(7001, 'tenant_bot', target, staleTimeout)
        await vi.advanceTimersByTimeAsync(TIMEOUT_MS / 2)

        sessions.remove(7001, 'tenant_bot', first?.sessionId)
        const second = sessions.tryBegin(7001, 'tenant_bot', { ...target, promptMessageId: 901 })
        await vi.advanceTimersByTimeAsync(TIMEOUT_MS / 2)

        expect(staleTimeout).not.toHaveBeenCalled()
        expect(sessions.get(7001, 'tenant_bot')?.sessionId).toBe(second?.sessionId)
    })

    it('should only remove the exact session when an id is given', () => {
        sessions.tryBegin(7001, 'tenant_bot', target)

        expect(sessions.remove(7001, 'tenant_bot', 'some-other-session')).toBeNull()
        expect(sessions.exists(7001, 'tenant_bot')).toBe(true)
    })

    it('should log and swallow a failing timeout handler', async () => {
        sessions.tryBegin(7001, 'tenant_bot', target, async () => {
            throw new Error('edit failed')
        })

        await vi.advanceTimersByTimeAsync(TIMEOUT_MS)

        expect(sessions.size()).toBe(0)
    })

    it('should replace a pending session on set and disarm its timer', async () => {
        const replacedTimeout = vi.fn()
        sessions.tryBegin(7001, 'tenant_bot', target, replacedTimeout)

        const replacement = sessions.set(7001, 'tenant_bot', { ...target, targetUserId: 56 })
        await vi.advanceTimersByTimeAsync(TIMEOUT_MS)

        expect(replacement.targetUserId).toBe(56)
        expect(replacedTimeout).not.toHaveBeenCalled()
        expect(sessions.size()).toBe(0)
    })
})
