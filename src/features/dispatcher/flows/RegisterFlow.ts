/**
 * Register Flow
 *
 * `/register <token>` on the dispatcher: brings the tenant bot up, records the sender
 * as its admin, then posts and pins the message that `/revoke` later reads the token from.
 */

import { t } from '~/core/i18n/responses'
import type { InboundMessage, TenantContext } from '~/core/types/telegram'
import { extractBotToken, resolveLanguage, shortenToken } from '~/core/utils/helpers'
import { createFlowLogger } from '~/core/utils/logger'
import { createUrlButton } from '~/core/utils/telegramButtons'
import { tolerate } from '~/features/messaging/utils/delivery'
import type { DispatcherServices } from '../types'

const flowLogger = createFlowLogger('register')

export async function handleRegister(
    message: InboundMessage,
    ctx: TenantContext,
    services: DispatcherServices
): Promise<void> {
    const { transport } = ctx
    const { lifecycle, store } = services
    const lang = resolveLanguage(message.from.languageCode)
    const args = message.command?.args ?? ''

    if (!args) {
        await transport.sendText(message.chatId, t('provideToken', lang), { parseMode: 'HTML' })
        return
    }

    const token = extractBotToken(args)
    if (!token) {
        await transport.sendText(message.chatId, t('invalidToken', lang))
        return
    }

    if (lifecycle.has(token)) {
        await transport.sendText(message.chatId, t('alreadyRegistered', lang))
        return
    }

    const progress = await transport.sendText(message.chatId, t('waitRegisteringBot', lang))

    try {
        const runtime = await lifecycle.getOrCreateRuntime(token)
        const username = runtime.identity.username

        const added = await store.addTenantRegistration(token, username, message.from.id)
        await transport.editText(progress.chatId, progress.messageId, t(added ? 'adminRegistered' : 'alreadyAdmin', lang))

        const announcement = await transport.sendText(
            message.chatId,
            t('botRegisteredSuccess', lang, { username, token }),
            {
                parseMode: 'HTML',
                keyboard: [[createUrlButton(t('botRegisteredButton', lang), `https://t.me/${username}?start=start`)]],
            }
        )
        await tolerate(
            transport.pinMessage(announcement.chatId, announcement.messageId),
            flowLogger,
            'Failed to pin registration message'
        )

        flowLogger.info({ bot: username, token: shortenToken(token), added }, 'Tenant registered')
    } catch (error) {
        flowLogger.error({ err: error, token: shortenToken(token) }, 'Tenant registration failed')
        const detail = error instanceof Error ? error.message : String(error)
        await transport.editText(progress.chatId, progress.messageId, t('registrationFailed', lang, { error: detail }))
    }
}
