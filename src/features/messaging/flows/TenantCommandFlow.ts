/**
 * Tenant bot commands: /start and /privacy
 */

import { t } from '~/core/i18n/responses'
import type { InboundMessage, TenantContext } from '~/core/types/telegram'
import { resolveLanguage } from '~/core/utils/helpers'
import type { RelayServices } from '../types'

export async function handleTenantCommand(
    message: InboundMessage,
    ctx: TenantContext,
    services: RelayServices
): Promise<boolean> {
    const lang = resolveLanguage(message.from.languageCode)
    const { creatorUsername, projectUrl } = services.presentation

    switch (message.command?.name) {
        case 'start':
            await ctx.transport.sendText(message.chatId, t('startCommand', lang, { creatorUsername }), {
                parseMode: 'HTML',
            })
            return true
        case 'privacy':
            await ctx.transport.sendText(message.chatId, t('privacyCommand', lang, { projectUrl }), {
                parseMode: 'HTML',
                disableLinkPreview: true,
            })
            return true
        default:
            return false
    }
}
