/**
 * Revoke Flow
 *
 * `/revoke` sent as a reply to the pinned registration message. The token is read back
 * from that message, so only the chat that registered a bot can revoke it.
 */

import { t } from '~/core/i18n/responses'
import type { InboundMessage, TenantContext } from '~/core/types/telegram'
import { extractBotToken, resolveLanguage, shortenToken } from '~/core/utils/helpers'
import { createFlowLogger } from '~/core/utils/logger'
import { tolerate } from '~/features/messaging/utils/delivery'
import type { DispatcherServices } from '../types'

const flowLogger = createFlowLogger('revoke')

const TOKEN_LABEL = 'Token:'

export async function handleRevoke(
    message: InboundMessage,
    ctx: TenantContext,
    services: DispatcherServices
): Promise<void> {
    const { transport } = ctx
    const lang = resolveLanguage(message.from.languageCode)
    const replied = message.replyTo

    const pinnedId = replied ? await transport.getPinnedMessageId(message.chatId) : null
    if (!replied || pinnedId === null || pinnedId !== replied.messageId) {
        await transport.sendText(message.chatId, t('revokeInstructions', lang))
        return
    }

    const text = replied.text ?? ''
    const labelAt = text.indexOf(TOKEN_LABEL)
    if (labelAt === -1) {
        await transport.sendText(message.chatId, t('invalidPinnedMessage', lang))
        return
    }

    const token = extractBotToken(text.slice(labelAt + TOKEN_LABEL.length))
    if (!token) {
        await transport.sendText(message.chatId, t('invalidToken', lang))
        return
    }

    try {
        const { unregistered } = await services.lifecycle.revoke(token)
        if (!unregistered) {
            await transport.sendText(message.chatId, t('revokeError', lang))
            return
        }

        await tolerate(transport.unpinMessage(message.chatId, replied.messageId), flowLogger, 'Failed to unpin')
        await transport.sendText(message.chatId, t('revokeSuccess', lang))
        flowLogger.info({ token: shortenToken(token) }, 'Tenant revoked by admin')
    } catch (error) {
        flowLogger.error({ err: error, token: shortenToken(token) }, 'Revocation failed')
        const detail = error instanceof Error ? error.message : String(error)
        await transport.sendText(message.chatId, t('revokeErrorDetail', lang, { error: detail }))
    }
}
