/**
 * Anonymous Choice Flow
 *
 * Handles the three buttons of the anonymity prompt. The prompt replies to the user's
 * message, so the content to deliver is the prompt's reply target.
 */

import { ANON_CHOICE_PREFIX } from '~/config/constants'
import { TransportError } from '~/core/errors'
import { t } from '~/core/i18n/responses'
import type { InboundCallback, SentMessage, TenantContext } from '~/core/types/telegram'
import { generateAnonymousId, resolveLanguage } from '~/core/utils/helpers'
import { createFlowLogger } from '~/core/utils/logger'
import type { AnonymousOption } from '~/features/correlation/services/Correlator'
import type { RelayServices } from '../types'
import { adminPanelHeader, buildAdminKeyboard } from '../utils/adminPanel'
import { copyWithFallback, forwardWithFallback, tolerate } from '../utils/delivery'

const flowLogger = createFlowLogger('anonymous-choice')

const CONFIRMATIONS = {
    NoHistory: 'messageSentNoHistory',
    WithHistory: 'messageSentWithHistory',
    Forward: 'messageForwarded',
} as const satisfies Record<AnonymousOption, string>

export function parseAnonymousOption(data: string): AnonymousOption | null {
    if (!data.startsWith(ANON_CHOICE_PREFIX)) return null
    const option = data.slice(ANON_CHOICE_PREFIX.length)
    return option === 'NoHistory' || option === 'WithHistory' || option === 'Forward' ? option : null
}

export async function handleAnonymousChoice(
    callback: InboundCallback,
    ctx: TenantContext,
    services: RelayServices
): Promise<void> {
    const { transport, bot } = ctx
    const { store, correlator } = services
    const lang = resolveLanguage(callback.from.languageCode)
    const option = parseAnonymousOption(callback.data)
    const prompt = callback.message

    if (!option || !prompt) {
        await transport.answerCallback(callback.id, t('adminInvalidMessageData', lang), true)
        return
    }
    await tolerate(transport.answerCallback(callback.id), flowLogger, 'Failed to answer callback')

    const original = prompt.replyTo
    if (!original) {
        await transport.editText(prompt.chatId, prompt.messageId, t('originalMessageDeleted', lang))
        return
    }

    await transport.editText(prompt.chatId, prompt.messageId, t('encryptingMessage', lang))

    const adminId = await store.getAdminIdForTenant(bot.username)
    if (adminId === null) {
        flowLogger.warn({ bot: bot.username }, 'No admin registered for tenant')
        await transport.editText(prompt.chatId, prompt.messageId, t('adminNotFound', lang))
        return
    }

    try {
        const { blockPayload, answerPayload } = await correlator.mintAdminControl({
            option,
            adminId,
            senderUserId: callback.from.id,
            originalMessageId: original.messageId,
        })
        const readPayload = await correlator.mintRead({
            senderUserId: callback.from.id,
            messageId: original.messageId,
        })

        const source = { fromChatId: prompt.chatId, messageId: original.messageId, fallbackText: original.text }
        let delivered: SentMessage
        let label: string | undefined
        if (option === 'Forward') {
            delivered = await forwardWithFallback(transport, adminId, source)
            label = [callback.from.firstName, callback.from.lastName].filter(Boolean).join(' ')
        } else {
            delivered = await copyWithFallback(transport, adminId, source)
            label = option === 'WithHistory' ? generateAnonymousId(callback.from.id, callback.from.firstName, true) : undefined
        }

        await transport.sendText(adminId, adminPanelHeader(option, label), {
            replyToMessageId: delivered.messageId,
            keyboard: buildAdminKeyboard({ readPayload, blockPayload, answerPayload }),
            parseMode: 'HTML',
            disableNotification: true,
        })

        await transport.editText(prompt.chatId, prompt.messageId, t(CONFIRMATIONS[option], lang))
        flowLogger.info({ bot: bot.username, option }, 'Message relayed to admin')
    } catch (error) {
        flowLogger.error({ err: error, bot: bot.username, option }, 'Failed to relay message')
        const notice =
            error instanceof TransportError && error.isTransient
                ? t('transientFailure', lang)
                : t('errorSendingMessage', lang)
        await transport.editText(prompt.chatId, prompt.messageId, notice)
    }
}
