/**
 * Incoming Message Flow
 *
 * Every non-command message a tenant bot receives:
 * - from the admin with an open reply session → delivered to the target user
 * - from the admin otherwise → reminder to use the Answer button
 * - from a blocked user → blocked notice
 * - from anyone else → the three-way anonymity prompt
 */

import { TransportError } from '~/core/errors'
import { t } from '~/core/i18n/responses'
import type { InboundMessage, TenantContext } from '~/core/types/telegram'
import { resolveLanguage } from '~/core/utils/helpers'
import { createFlowLogger } from '~/core/utils/logger'
import { parsePayload } from '~/features/correlation/services/Correlator'
import type { AdminReplySession } from '~/features/replies/stores/AdminReplySessionStore'
import type { RelayServices } from '../types'
import { anonymousChoiceKeyboard, readKeyboard } from '../utils/adminPanel'
import { copyWithFallback, tolerate } from '../utils/delivery'

const flowLogger = createFlowLogger('incoming-message')

export async function handleIncomingMessage(
    message: InboundMessage,
    ctx: TenantContext,
    services: RelayServices
): Promise<void> {
    const { store, sessions } = services
    const lang = resolveLanguage(message.from.languageCode)
    const botUsername = ctx.bot.username

    if (await store.isAdmin(message.from.id, botUsername)) {
        const session = sessions.get(message.from.id, botUsername)
        if (session) {
            await deliverAdminReply(message, session, ctx, services)
            return
        }
        await ctx.transport.sendText(message.chatId, t('adminMustUseAnswerButton', lang), {
            replyToMessageId: message.messageId,
        })
        return
    }

    if (await store.isUserBlocked(message.from.id, botUsername)) {
        flowLogger.debug({ bot: botUsername }, 'Message from blocked user dropped')
        await ctx.transport.sendText(message.chatId, t('userBlocked', lang), { replyToMessageId: message.messageId })
        return
    }

    await ctx.transport.sendText(message.chatId, t('choicePrompt', lang), {
        replyToMessageId: message.messageId,
        keyboard: anonymousChoiceKeyboard(lang),
    })
}

/**
 * Send the admin's message to the user their open session points at.
 * The session ends whatever the outcome.
 */
export async function deliverAdminReply(
    message: InboundMessage,
    session: AdminReplySession,
    ctx: TenantContext,
    services: RelayServices
): Promise<void> {
    const { correlator, sessions } = services
    const { transport } = ctx
    const lang = session.language

    sessions.remove(session.adminId, session.botUsername, session.sessionId)

    let readPayload: string | null = null
    try {
        // Read receipt for the admin's own message
        readPayload = await correlator.mintRead({ senderUserId: message.from.id, messageId: message.messageId })
        await copyWithFallback(
            transport,
            session.targetUserId,
            { fromChatId: message.chatId, messageId: message.messageId, fallbackText: message.text },
            { replyToMessageId: session.originalMessageId, keyboard: readKeyboard(readPayload) }
        )
    } catch (error) {
        if (readPayload) {
            await tolerate(
                correlator.consumeRead(parsePayload(readPayload).prefix),
                flowLogger,
                'Failed to drop unused read token'
            )
        }
        flowLogger.warn({ err: error, bot: ctx.bot.username }, 'Admin reply not delivered')

        let notice = t('adminReplyFailed', lang)
        if (error instanceof TransportError && error.kind === 'forbidden') {
            notice = t('adminReplyFailedUserBlockedBot', lang)
        } else if (error instanceof TransportError && error.isTransient) {
            notice = t('transientFailure', lang)
        }
        await tolerate(
            transport.sendText(message.chatId, notice, { replyToMessageId: message.messageId }),
            flowLogger,
            'Failed to report undelivered reply'
        )
        return
    }

    await tolerate(
        transport.sendText(message.chatId, t('adminReplySent', lang), {
            replyToMessageId: session.anchorMessageId ?? message.messageId,
        }),
        flowLogger,
        'Failed to confirm admin reply'
    )
    await tolerate(
        transport.deleteMessage(session.chatId, session.promptMessageId),
        flowLogger,
        'Failed to delete reply prompt'
    )
    flowLogger.info({ bot: ctx.bot.username }, 'Admin reply delivered')
}
