import { t } from '~/core/i18n/responses'
import type { InboundMessage, TenantContext } from '~/core/types/telegram'
import { resolveLanguage } from '~/core/utils/helpers'
import type { DispatcherServices } from '../types'

/**
 * /start, /about and /privacy on the dispatcher
 */
export async function handleInfoCommand(
    message: InboundMessage,
    ctx: TenantContext,
    services: DispatcherServices
): Promise<boolean> {
    const lang = resolveLanguage(message.from.languageCode)
    const { serviceName, projectUrl } = services.presentation
    const options = { parseMode: 'HTML', disableLinkPreview: true } as const

    switch (message.command?.name) {
        case 'start':
            await ctx.transport.sendText(
                message.chatId,
                t('welcome', lang, { creatorUsername: ctx.bot.username, serviceName }),
                options
            )
            return true
        case 'about':
            await ctx.transport.sendText(message.chatId, t('aboutCommand', lang, { serviceName, projectUrl }), options)
            return true
        case 'privacy':
            await ctx.transport.sendText(message.chatId, t('privacyCommand', lang, { projectUrl }), options)
            return true
        default:
            return false
    }
}
