/**
 * Admin Reply Session Store
 *
 * In-memory "awaiting reply" slots, one per (admin, tenant bot). An Answer press opens a
 * slot; the admin's next plain message to that bot is delivered to the stored target.
 * Each slot ends exactly once: reply sent, cancel pressed, error, or timeout.
 *
 * Every session carries its own id. The timeout only clears the session it was armed for,
 * so a timer that fires after a cancel (or after a newer session replaced it) does nothing.
 */

import { randomUUID } from 'crypto'
import type { Language } from '~/config/constants'
import { createFlowLogger } from '~/core/utils/logger'

const logger = createFlowLogger('admin-reply-sessions')

export interface AdminReplyTarget {
    targetUserId: number
    originalMessageId: number
    /** Admin chat holding the control panel */
    chatId: number
    /** The "send your reply within N minutes" prompt */
    promptMessageId: number
    /** Admin message the prompt replies to, where the success notice is threaded */
    anchorMessageId?: number
    language: Language
}

export interface AdminReplySession extends AdminReplyTarget {
    sessionId: string
    adminId: number
    botUsername: string
    createdAt: Date
}

export type SessionTimeoutHandler = (session: AdminReplySession) => void | Promise<void>

interface Slot {
    session: AdminReplySession
    timer: NodeJS.Timeout | null
}

export class AdminReplySessionStore {
    private readonly slots = new Map<string, Slot>()

    constructor(private readonly timeoutMs: number) {
        logger.info({ timeoutMs }, 'AdminReplySessionStore initialized')
    }

    private static keyOf(adminId: number, botUsername: string): string {
        return `${adminId}:${botUsername.toLowerCase()}`
    }

    /**
     * Open a session unless one is already pending for this admin and bot.
     * Returns null when a session exists (the existing one is untouched).
     */
    tryBegin(
        adminId: number,
        botUsername: string,
        target: AdminReplyTarget,
        onTimeout?: SessionTimeoutHandler
    ): AdminReplySession | null {
        if (this.exists(adminId, botUsername)) {
            return null
        }
        return this.open(adminId, botUsername, target, onTimeout)
    }

    /**
     * Open a session, replacing (and disarming) any pending one for this admin and bot
     */
    set(
        adminId: number,
        botUsername: string,
        target: AdminReplyTarget,
        onTimeout?: SessionTimeoutHandler
    ): AdminReplySession {
        this.remove(adminId, botUsername)
        return this.open(adminId, botUsername, target, onTimeout)
    }

    get(adminId: number, botUsername: string): AdminReplySession | null {
        return this.slots.get(AdminReplySessionStore.keyOf(adminId, botUsername))?.session ?? null
    }

    exists(adminId: number, botUsername: string): boolean {
        return this.slots.has(AdminReplySessionStore.keyOf(adminId, botUsername))
    }

    /**
     * End a session. With a sessionId, only that exact session is removed.
     * Returns the removed session, or null when there was nothing to remove.
     */
    remove(adminId: number, botUsername: string, sessionId?: string): AdminReplySession | null {
        const key = AdminReplySessionStore.keyOf(adminId, botUsername)
        const slot = this.slots.get(key)
        if (!slot || (sessionId !== undefined && slot.session.sessionId !== sessionId)) {
            return null
        }

        if (slot.timer) {
            clearTimeout(slot.timer)
        }
        this.slots.delete(key)
        logger.debug({ adminId, botUsername }, 'Reply session closed')
        return slot.session
    }

    /**
     * Clear all sessions (for shutdown/testing)
     */
    clearAll(): void {
        for (const slot of this.slots.values()) {
            if (slot.timer) {
                clearTimeout(slot.timer)
            }
        }
        const count = this.slots.size
        this.slots.clear()
        logger.info({ count }, 'All reply sessions cleared')
    }

    size(): number {
        return this.slots.size
    }

    private open(
        adminId: number,
        botUsername: string,
        target: AdminReplyTarget,
        onTimeout?: SessionTimeoutHandler
    ): AdminReplySession {
        const key = AdminReplySessionStore.keyOf(adminId, botUsername)
        const session: AdminReplySession = {
            ...target,
            sessionId: randomUUID(),
            adminId,
            botUsername,
            createdAt: new Date(),
        }

        const timer = setTimeout(() => {
            void this.expire(key, session.sessionId, onTimeout)
        }, this.timeoutMs)
        timer.unref()

        this.slots.set(key, { session, timer })
        logger.debug({ adminId, botUsername }, 'Reply session opened')
        return session
    }

    private async expire(key: string, sessionId: string, onTimeout?: SessionTimeoutHandler): Promise<void> {
        const slot = this.slots.get(key)
        if (!slot || slot.session.sessionId !== sessionId) {
            return
        }
        this.slots.delete(key)
        logger.info({ adminId: slot.session.adminId, botUsername: slot.session.botUsername }, 'Reply session timed out')

        if (!onTimeout) return
        try {
            await onTimeout(slot.session)
        } catch (error) {
            logger.error({ err: error }, 'Reply timeout handler failed')
        }
    }
}
