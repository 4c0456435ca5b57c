/**
 * Drives the tenant router the way Telegram would: users and the admin send messages and
 * press buttons on messages the fake transport recorded.
 */

import type { InboundCallback, InboundUser, TenantContext } from '~/core/types/telegram'
import type { InlineKeyboard } from '~/core/utils/telegramButtons'
import { createTenantRouter } from '~/features/messaging/tenantRouter'
import type { RelayServices } from '~/features/messaging/types'
import { AdminReplySessionStore } from '~/features/replies/stores/AdminReplySessionStore'
import type { UpdateRoute } from '~/features/runtime/types'
import { FakeTransport, type SentRecord } from './FakeTransport'
import { createTestStack, type TestStack } from './testStack'

export const TENANT_TOKEN = '200000:tenant-test-token'
export const REPLY_TIMEOUT_MS = 20 * 60 * 1000

export const ADMIN: InboundUser = { id: 7001, firstName: 'Admin', languageCode: 'en' }
export const USER: InboundUser = { id: 55, firstName: 'Sam', lastName: 'Doe', languageCode: 'en' }

export class RelayHarness {
    readonly transport = new FakeTransport({ id: 42, username: 'tenant_test_bot', firstName: 'Tenant' })
    readonly stack: TestStack = createTestStack()
    readonly sessions = new AdminReplySessionStore(REPLY_TIMEOUT_MS)
    readonly services: RelayServices
    readonly route: UpdateRoute
    readonly ctx: TenantContext
    private callbackSeq = 0
    // Inbound messages are not recorded by the transport; their text backs reply references
    private readonly userTexts = new Map<string, string>()

    constructor() {
        this.services = {
            store: this.stack.store,
            correlator: this.stack.correlator,
            sessions: this.sessions,
            replyTimeoutMs: REPLY_TIMEOUT_MS,
            presentation: {
                serviceName: 'Veil',
                projectUrl: 'https://example.com/veil-relay',
                creatorUsername: 'dispatcher_test_bot',
            },
        }
        this.route = createTenantRouter(this.services)
        this.ctx = { transport: this.transport, bot: this.transport.identity, token: TENANT_TOKEN }
    }

    async registerAdmin(admin: InboundUser = ADMIN): Promise<void> {
        await this.stack.store.addTenantRegistration(TENANT_TOKEN, this.ctx.bot.username, admin.id)
    }

    /**
     * A private-chat message; the chat id equals the sender id
     */
    async send(from: InboundUser, messageId: number, text: string): Promise<void> {
        this.userTexts.set(`${from.id}:${messageId}`, text)
        const command = text.startsWith('/') ? { name: text.slice(1).split(' ')[0], args: '' } : undefined
        await this.route(
            { kind: 'message', message: { chatId: from.id, messageId, from, text, ...(command ? { command } : {}) } },
            this.ctx
        )
    }

    /**
     * Press a button on a recorded outbound message
     */
    async press(from: InboundUser, on: SentRecord, data: string): Promise<InboundCallback> {
        const callback: InboundCallback = {
            id: `cb-${++this.callbackSeq}`,
            data,
            from,
            message: {
                chatId: on.chatId,
                messageId: on.messageId,
                keyboard: on.options?.keyboard ?? [],
                ...(on.text !== undefined ? { text: plainText(on.text) } : {}),
                ...(on.options?.replyToMessageId !== undefined
                    ? {
                          replyTo: {
                              messageId: on.options.replyToMessageId,
                              ...this.textOf(on.chatId, on.options.replyToMessageId),
                          },
                      }
                    : {}),
            },
        }
        await this.route({ kind: 'callback', callback }, this.ctx)
        return callback
    }

    /**
     * Press a button on a message after it was edited (text and keyboard as the client now shows them)
     */
    async pressEdited(
        from: InboundUser,
        on: SentRecord,
        edited: { text: string; keyboard: InlineKeyboard },
        data: string
    ): Promise<void> {
        await this.press(from, { ...on, text: edited.text, options: { ...on.options, keyboard: edited.keyboard } }, data)
    }

    /**
     * Last recorded message carrying a keyboard, for one chat
     */
    lastWithKeyboard(chatId: number): SentRecord {
        const found = this.transport.getSentTo(chatId).filter((msg) => msg.options?.keyboard)
        const last = found[found.length - 1]
        if (!last) {
            throw new Error(`No message with a keyboard was sent to ${chatId}`)
        }
        return last
    }

    close(): void {
        this.sessions.clearAll()
        this.stack.db.close()
    }

    private textOf(chatId: number, messageId: number): { text?: string } {
        const text =
            this.userTexts.get(`${chatId}:${messageId}`) ??
            this.transport.sent.find((msg) => msg.chatId === chatId && msg.messageId === messageId)?.text
        return text !== undefined ? { text } : {}
    }
}

/**
 * Telegram hands back message text without HTML markup
 */
function plainText(html: string): string {
    return html
        .replace(/<[^>]+>/g, '')
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>')
        .replace(/&amp;/g, '&')
}

/**
 * Button payload by button text
 */
export function buttonData(record: SentRecord, text: string): string {
    for (const row of record.options?.keyboard ?? []) {
        for (const btn of row) {
            if (btn.text === text && 'data' in btn) return btn.data
        }
    }
    throw new Error(`No button "${text}" on message ${record.messageId}`)
}
