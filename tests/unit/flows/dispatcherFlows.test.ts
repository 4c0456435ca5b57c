/**
 * Dispatcher commands: registering and revoking tenant bots
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { t } from '~/core/i18n/responses'
import type { InboundMessage, InboundUser, ReplyReference, TenantContext } from '~/core/types/telegram'
import { createDispatcherRouter } from '~/features/dispatcher/dispatcherRouter'
import type { DispatcherServices } from '~/features/dispatcher/types'
import { TenantRuntimeManager } from '~/features/runtime/services/TenantRuntimeManager'
import type { UpdateRoute } from '~/features/runtime/types'
import { parseCommand } from '~/features/runtime/utils/updateMapper'
import { FakeRuntimeFactory } from '../../utils/FakeRuntimeFactory'
import { FakeTransport } from '../../utils/FakeTransport'
import { createTestStack, type TestStack } from '../../utils/testStack'

const OWNER: InboundUser = { id: 7001, firstName: 'Owner', languageCode: 'en' }
const TENANT_TOKEN = '300000:tenant-abc'

describe('Dispatcher flows', () => {
    let transport: FakeTransport
    let stack: TestStack
    let factory: FakeRuntimeFactory
    let manager: TenantRuntimeManager
    let route: UpdateRoute
    let ctx: TenantContext
    let nextMessageId: number

    beforeEach(() => {
        transport = new FakeTransport({ id: 100000, username: 'dispatcher_test_bot', firstName: 'Dispatcher' })
        stack = createTestStack()
        factory = new FakeRuntimeFactory()
        manager = new TenantRuntimeManager(factory, stack.store, { capacity: 10 })
        const services: DispatcherServices = {
            lifecycle: manager,
            store: stack.store,
            presentation: {
                serviceName: 'Veil',
                projectUrl: 'https://example.com/veil-relay',
                creatorUsername: 'dispatcher_test_bot',
            },
        }
        route = createDispatcherRouter(services)
        ctx = { transport, bot: transport.identity, token: '100000:dispatcher-test-token' }
        nextMessageId = 1
    })

    afterEach(async () => {
        await manager.shutdown()
        stack.db.close()
    })

    async function command(text: string, replyTo?: ReplyReference): Promise<void> {
        const message: InboundMessage = {
            chatId: OWNER.id,
            messageId: nextMessageId++,
            from: OWNER,
            text,
            command: parseCommand(text, ctx.bot.username),
            ...(replyTo ? { replyTo } : {}),
        }
        await route({ kind: 'message', message }, ctx)
    }

    describe('/register', () => {
        it('should start the bot, record the admin and pin the token message', async () => {
            await command(`/register ${TENANT_TOKEN}`)

            const [progress, announcement] = transport.sent
            expect(progress.text).toBe(t('waitRegisteringBot'))
            expect(transport.lastEditOf(OWNER.id, progress.messageId)).toBe(t('adminRegistered'))
            expect(announcement.text).toBe(t('botRegisteredSuccess', 'en', { username: 'bot_300000', token: TENANT_TOKEN }))
            expect(announcement.options?.keyboard).toEqual([
                [{ text: t('botRegisteredButton'), url: 'https://t.me/bot_300000?start=start' }],
            ])
            expect(transport.pinned.get(OWNER.id)).toBe(announcement.messageId)

            expect(manager.has(TENANT_TOKEN)).toBe(true)
            expect(await stack.store.isRegisteredTenant(TENANT_TOKEN)).toBe(true)
            expect(await stack.store.getAdminIdForTenant('bot_300000')).toBe(OWNER.id)
        })

        it('should ask for a token when none is given', async () => {
            await command('/register')

            expect(transport.sendText).toHaveBeenCalledWith(OWNER.id, t('provideToken'), { parseMode: 'HTML' })
            expect(factory.create).not.toHaveBeenCalled()
        })

        it('should reject text that is not a token', async () => {
            await command('/register hello')

            expect(transport.getLastSent()?.text).toBe(t('invalidToken'))
        })

        it('should refuse a bot that is already running', async () => {
            await command(`/register ${TENANT_TOKEN}`)
            await command(`/register ${TENANT_TOKEN}`)

            expect(transport.getLastSent()?.text).toBe(t('alreadyRegistered'))
            expect(factory.create).toHaveBeenCalledTimes(1)
        })

        it('should keep an existing admin registration', async () => {
            await stack.store.addTenantRegistration(TENANT_TOKEN, 'bot_300000', OWNER.id)

            await command(`/register ${TENANT_TOKEN}`)

            expect(transport.lastEditOf(OWNER.id, transport.sent[0].messageId)).toBe(t('alreadyAdmin'))
        })

        it('should report a bot that cannot be started', async () => {
            factory.create.mockRejectedValueOnce(new Error('401: Unauthorized'))

            await command(`/register ${TENANT_TOKEN}`)

            expect(transport.lastEditOf(OWNER.id, transport.sent[0].messageId)).toBe(
                t('registrationFailed', 'en', { error: '401: Unauthorized' })
            )
            expect(await stack.store.isRegisteredTenant(TENANT_TOKEN)).toBe(false)
            expect(transport.pinMessage).not.toHaveBeenCalled()
        })
    })

    describe('/revoke', () => {
        async function registerAndGetPinned(): Promise<ReplyReference> {
            await command(`/register ${TENANT_TOKEN}`)
            const pinnedId = transport.pinned.get(OWNER.id)
            if (pinnedId === undefined) throw new Error('registration message was not pinned')
            return {
                messageId: pinnedId,
                // Telegram returns the text without markup
                text: `Successfully registered bot @bot_300000!\nToken:\n${TENANT_TOKEN}\nTo start receiving messages, ...`,
            }
        }

        it('should stop the bot and delete its registration', async () => {
            const pinned = await registerAndGetPinned()
            const runtime = factory.created[0]

            await command('/revoke', pinned)

            expect(transport.getLastSent()?.text).toBe(t('revokeSuccess'))
            expect(runtime.stopCalls).toBe(1)
            expect(factory.releaseWebhook).toHaveBeenCalledWith(TENANT_TOKEN)
            expect(manager.has(TENANT_TOKEN)).toBe(false)
            expect(await stack.store.isRegisteredTenant(TENANT_TOKEN)).toBe(false)
            expect(transport.pinned.has(OWNER.id)).toBe(false)
        })

        it('should explain how to revoke when not replying to the pinned message', async () => {
            const pinned = await registerAndGetPinned()

            await command('/revoke')
            expect(transport.getLastSent()?.text).toBe(t('revokeInstructions'))

            await command('/revoke', { ...pinned, messageId: pinned.messageId + 50 })
            expect(transport.getLastSent()?.text).toBe(t('revokeInstructions'))
            expect(manager.has(TENANT_TOKEN)).toBe(true)
        })

        it('should reject a pinned message without a token', async () => {
            transport.pinned.set(OWNER.id, 77)

            await command('/revoke', { messageId: 77, text: 'Remember the milk' })

            expect(transport.getLastSent()?.text).toBe(t('invalidPinnedMessage'))
        })

        it('should report a token that is no longer registered', async () => {
            const pinned = await registerAndGetPinned()
            await command('/revoke', pinned)
            transport.pinned.set(OWNER.id, pinned.messageId)

            await command('/revoke', pinned)

            expect(transport.getLastSent()?.text).toBe(t('revokeError'))
        })
    })

    describe('info commands', () => {
        it('should greet with the guide on /start', async () => {
            await command('/start')

            expect(transport.sendText).toHaveBeenCalledWith(
                OWNER.id,
                t('welcome', 'en', { creatorUsername: 'dispatcher_test_bot', serviceName: 'Veil' }),
                { parseMode: 'HTML', disableLinkPreview: true }
            )
        })

        it('should describe the service on /about', async () => {
            await command('/about')

            expect(transport.getLastSent()?.text).toBe(
                t('aboutCommand', 'en', { serviceName: 'Veil', projectUrl: 'https://example.com/veil-relay' })
            )
        })

        it('should ignore unknown commands and plain text', async () => {
            await command('/settings')
            await command('hello there')

            expect(transport.sent).toHaveLength(0)
        })
    })
})
