/**
 * Admin Control Flow
 *
 * Block/Unblock, Answer and Cancel buttons on the admin's side of a tenant bot.
 * Block and Answer carry a correlation token that only the admin it was minted for can resolve.
 */

import { CALLBACKS } from '~/config/constants'
import { CorrelationError } from '~/core/errors'
import { t } from '~/core/i18n/responses'
import type { InboundCallback, TenantContext } from '~/core/types/telegram'
import { resolveLanguage } from '~/core/utils/helpers'
import { createFlowLogger } from '~/core/utils/logger'
import type { AdminControlRecord } from '~/features/correlation/services/Correlator'
import type { RelayServices } from '../types'
import { buildAdminKeyboard, cancelReplyKeyboard, markBlocked, markUnblocked, parseAdminKeyboard } from '../utils/adminPanel'
import { tolerate } from '../utils/delivery'

const flowLogger = createFlowLogger('admin-control')

type PanelMessage = NonNullable<InboundCallback['message']>

export function isAdminControlData(data: string): boolean {
    return (
        data === CALLBACKS.ADMIN_CANCEL_ANSWER ||
        data.startsWith(`${CALLBACKS.ADMIN_BLOCK}|`) ||
        data.startsWith(`${CALLBACKS.ADMIN_ANSWER}|`)
    )
}

export async function handleAdminControl(
    callback: InboundCallback,
    ctx: TenantContext,
    services: RelayServices
): Promise<void> {
    const { transport, bot } = ctx
    const lang = resolveLanguage(callback.from.languageCode)

    if (callback.data === CALLBACKS.ADMIN_CANCEL_ANSWER) {
        await handleCancel(callback, ctx, services)
        return
    }

    const panel = callback.message
    if (!panel) {
        await transport.answerCallback(callback.id, t('adminInvalidMessageData', lang), true)
        return
    }

    const resolved = await services.correlator.resolveAdminControl(callback.data).catch((error: unknown) => {
        if (!(error instanceof CorrelationError)) throw error
        flowLogger.warn({ err: error, bot: bot.username }, 'Unresolvable admin control token')
        return null
    })
    if (!resolved) {
        await transport.answerCallback(callback.id, t('adminInvalidMessageData', lang), true)
        return
    }

    const { operation, record } = resolved
    if (record.adminId !== callback.from.id) {
        flowLogger.warn({ bot: bot.username }, 'Admin control pressed by another user')
        await transport.answerCallback(callback.id, t('adminInvalidMessageData', lang), true)
        return
    }

    switch (operation) {
        case CALLBACKS.ADMIN_ANSWER:
            await handleAnswer(callback, panel, record, ctx, services)
            return
        case CALLBACKS.ADMIN_BLOCK:
            await handleBlockToggle(callback, panel, record, ctx, services)
            return
        default:
            await transport.answerCallback(callback.id, t('adminUnknownOperation', lang), true)
    }
}

/**
 * Open a reply session and post the "send your reply" prompt with a Cancel button
 */
async function handleAnswer(
    callback: InboundCallback,
    panel: PanelMessage,
    record: AdminControlRecord,
    ctx: TenantContext,
    services: RelayServices
): Promise<void> {
    const { transport, bot } = ctx
    const { sessions, replyTimeoutMs } = services
    const lang = resolveLanguage(callback.from.languageCode)

    if (sessions.exists(callback.from.id, bot.username)) {
        await transport.answerCallback(callback.id, t('adminOngoingReply', lang), true)
        return
    }

    try {
        // The panel replies to the relayed copy; thread the prompt there too
        const anchorMessageId = panel.replyTo?.messageId ?? panel.messageId
        const prompt = await transport.sendText(
            panel.chatId,
            t('adminReplyWait', lang, { minutes: Math.round(replyTimeoutMs / 60_000) }),
            { replyToMessageId: anchorMessageId, keyboard: cancelReplyKeyboard(lang) }
        )

        const session = sessions.tryBegin(
            callback.from.id,
            bot.username,
            {
                targetUserId: record.senderUserId,
                originalMessageId: record.originalMessageId,
                chatId: panel.chatId,
                promptMessageId: prompt.messageId,
                anchorMessageId,
                language: lang,
            },
            async (expired) => {
                await transport.editText(expired.chatId, expired.promptMessageId, t('adminReplyTimeout', expired.language))
            }
        )

        if (!session) {
            await tolerate(transport.deleteMessage(prompt.chatId, prompt.messageId), flowLogger, 'Failed to drop prompt')
            await transport.answerCallback(callback.id, t('adminOngoingReply', lang), true)
            return
        }

        await transport.answerCallback(callback.id, t('adminReplyAwaiting', lang))
    } catch (error) {
        flowLogger.error({ err: error, bot: bot.username }, 'Failed to start reply session')
        await transport.answerCallback(callback.id, t('adminReplyError', lang), true)
    }
}

async function handleCancel(callback: InboundCallback, ctx: TenantContext, services: RelayServices): Promise<void> {
    const { transport, bot } = ctx
    const lang = resolveLanguage(callback.from.languageCode)

    const removed = services.sessions.remove(callback.from.id, bot.username)
    if (!removed) {
        await transport.answerCallback(callback.id, t('adminNoOngoingReply', lang))
        return
    }

    await tolerate(
        transport.editText(removed.chatId, removed.promptMessageId, t('adminReplyCanceled', lang)),
        flowLogger,
        'Failed to mark prompt as canceled'
    )
    await transport.answerCallback(callback.id, t('adminReplyCanceled', lang))
}

/**
 * Flip the sender's block state and redraw the panel to match
 */
async function handleBlockToggle(
    callback: InboundCallback,
    panel: PanelMessage,
    record: AdminControlRecord,
    ctx: TenantContext,
    services: RelayServices
): Promise<void> {
    const { transport, bot } = ctx
    const { store } = services
    const lang = resolveLanguage(callback.from.languageCode)

    const payloads = parseAdminKeyboard(panel.keyboard)
    if (!payloads || panel.text === undefined) {
        await transport.answerCallback(callback.id, t('adminInvalidMessageData', lang), true)
        return
    }

    try {
        const blocked = await store.isUserBlocked(record.senderUserId, bot.username)
        if (blocked) {
            if (!(await store.unblockUser(record.senderUserId, bot.username))) {
                await transport.answerCallback(callback.id, t('adminUnblockError', lang), true)
                return
            }
            await transport.editText(panel.chatId, panel.messageId, markUnblocked(panel.text), {
                keyboard: buildAdminKeyboard(payloads, false),
            })
            await transport.answerCallback(callback.id, t('adminUserUnblocked', lang))
            flowLogger.info({ bot: bot.username }, 'User unblocked')
            return
        }

        if (!(await store.blockUser(record.senderUserId, bot.username))) {
            await transport.answerCallback(callback.id, t('adminBlockProcessError', lang), true)
            return
        }
        await transport.editText(panel.chatId, panel.messageId, markBlocked(panel.text), {
            keyboard: buildAdminKeyboard(payloads, true),
        })
        await transport.answerCallback(callback.id, t('adminUserBlocked', lang))
        flowLogger.info({ bot: bot.username }, 'User blocked')
    } catch (error) {
        flowLogger.error({ err: error, bot: bot.username }, 'Block toggle failed')
        await transport.answerCallback(callback.id, t('adminBlockProcessError', lang), true)
    }
}
