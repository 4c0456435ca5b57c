/**
 * Read Receipt Flow
 *
 * The 👀 Read button: drops itself from the keyboard and reacts on the message it stands for.
 * Works on both sides (admin reading a user message, user reading an admin reply).
 */

import { CALLBACKS, EMOJI } from '~/config/constants'
import { CorrelationError } from '~/core/errors'
import { t } from '~/core/i18n/responses'
import type { InboundCallback, TenantContext } from '~/core/types/telegram'
import { resolveLanguage } from '~/core/utils/helpers'
import { createFlowLogger } from '~/core/utils/logger'
import type { RelayServices } from '../types'
import { removeReadButton } from '../utils/adminPanel'
import { tolerate } from '../utils/delivery'

const flowLogger = createFlowLogger('read-receipt')

export function isReadReceiptData(data: string): boolean {
    return data.startsWith(`${CALLBACKS.READ_MESSAGE}|`)
}

export async function handleReadReceipt(
    callback: InboundCallback,
    ctx: TenantContext,
    services: RelayServices
): Promise<void> {
    const { transport, bot } = ctx
    const lang = resolveLanguage(callback.from.languageCode)

    if (callback.message) {
        const { chatId, messageId, keyboard } = callback.message
        await tolerate(
            transport.editKeyboard(chatId, messageId, removeReadButton(keyboard, callback.data)),
            flowLogger,
            'Failed to remove Read button'
        )
    }

    const resolved = await services.correlator.resolveRead(callback.data).catch((error: unknown) => {
        if (!(error instanceof CorrelationError)) throw error
        flowLogger.warn({ err: error, bot: bot.username }, 'Unresolvable read token')
        return null
    })
    if (!resolved) {
        await transport.answerCallback(callback.id, t('adminInvalidMessageData', lang), true)
        return
    }

    const { prefix, record } = resolved
    // The original message may be gone or the reader blocked; the receipt is best effort
    await tolerate(
        transport.setReaction(record.senderUserId, record.messageId, EMOJI.READ),
        flowLogger,
        'Failed to set read reaction'
    )
    await tolerate(services.correlator.consumeRead(prefix), flowLogger, 'Failed to delete read token')
    await tolerate(transport.answerCallback(callback.id), flowLogger, 'Failed to answer callback')
}
