/**
 * BotTransport backed by telegraf's Telegram client.
 * Every rejection is rethrown as a TransportError so flows can branch on its kind.
 */

import type { Telegram } from 'telegraf'
import type { InlineKeyboardMarkup } from 'telegraf/types'
import { toTransportError } from '~/core/errors'
import type {
    BotIdentity,
    BotProfile,
    BotTransport,
    ChatId,
    EditTextOptions,
    ReactionEmoji,
    SendOptions,
    SentMessage,
    WebhookOptions,
} from '~/core/types/telegram'
import { createInlineKeyboard, type InlineKeyboard } from '~/core/utils/telegramButtons'

function markup(keyboard: InlineKeyboard): InlineKeyboardMarkup {
    return { inline_keyboard: createInlineKeyboard(keyboard) }
}

function sendExtra(options: SendOptions) {
    return {
        ...(options.keyboard ? { reply_markup: markup(options.keyboard) } : {}),
        ...(options.replyToMessageId !== undefined
            ? { reply_parameters: { message_id: options.replyToMessageId, allow_sending_without_reply: true } }
            : {}),
        ...(options.parseMode ? { parse_mode: options.parseMode } : {}),
        ...(options.disableNotification ? { disable_notification: true } : {}),
    }
}

export class TelegrafTransport implements BotTransport {
    constructor(private readonly telegram: Telegram) {}

    private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn()
        } catch (error) {
            throw toTransportError(error, operation)
        }
    }

    sendText(chatId: ChatId, text: string, options: SendOptions = {}): Promise<SentMessage> {
        return this.call('sendMessage', async () => {
            const message = await this.telegram.sendMessage(chatId, text, {
                ...sendExtra(options),
                ...(options.disableLinkPreview ? { link_preview_options: { is_disabled: true } } : {}),
            })
            return { messageId: message.message_id, chatId: message.chat.id }
        })
    }

    copyMessage(toChatId: ChatId, fromChatId: ChatId, messageId: number, options: SendOptions = {}): Promise<SentMessage> {
        return this.call('copyMessage', async () => {
            const copied = await this.telegram.copyMessage(toChatId, fromChatId, messageId, sendExtra(options))
            return { messageId: copied.message_id, chatId: toChatId }
        })
    }

    forwardMessage(toChatId: ChatId, fromChatId: ChatId, messageId: number): Promise<SentMessage> {
        return this.call('forwardMessage', async () => {
            const message = await this.telegram.forwardMessage(toChatId, fromChatId, messageId)
            return { messageId: message.message_id, chatId: message.chat.id }
        })
    }

    editText(chatId: ChatId, messageId: number, text: string, options: EditTextOptions = {}): Promise<void> {
        return this.call('editMessageText', async () => {
            await this.telegram.editMessageText(chatId, messageId, undefined, text, {
                ...(options.keyboard ? { reply_markup: markup(options.keyboard) } : {}),
                ...(options.parseMode ? { parse_mode: options.parseMode } : {}),
            })
        })
    }

    editKeyboard(chatId: ChatId, messageId: number, keyboard: InlineKeyboard): Promise<void> {
        return this.call('editMessageReplyMarkup', async () => {
            await this.telegram.editMessageReplyMarkup(chatId, messageId, undefined, markup(keyboard))
        })
    }

    setReaction(chatId: ChatId, messageId: number, emoji: ReactionEmoji): Promise<void> {
        return this.call('setMessageReaction', async () => {
            await this.telegram.setMessageReaction(chatId, messageId, [{ type: 'emoji', emoji }], false)
        })
    }

    deleteMessage(chatId: ChatId, messageId: number): Promise<void> {
        return this.call('deleteMessage', async () => {
            await this.telegram.deleteMessage(chatId, messageId)
        })
    }

    answerCallback(callbackId: string, text?: string, showAlert = false): Promise<void> {
        return this.call('answerCallbackQuery', async () => {
            await this.telegram.answerCbQuery(callbackId, text, { show_alert: showAlert })
        })
    }

    getMe(): Promise<BotIdentity> {
        return this.call('getMe', async () => {
            const me = await this.telegram.getMe()
            return { id: me.id, username: me.username, firstName: me.first_name }
        })
    }

    getWebhookUrl(): Promise<string> {
        return this.call('getWebhookInfo', async () => {
            const info = await this.telegram.getWebhookInfo()
            return info.url
        })
    }

    setWebhook(url: string, options: WebhookOptions): Promise<void> {
        return this.call('setWebhook', async () => {
            await this.telegram.setWebhook(url, {
                secret_token: options.secretToken,
                allowed_updates: [...options.allowedUpdates],
                drop_pending_updates: options.dropPendingUpdates ?? false,
            })
        })
    }

    deleteWebhook(): Promise<void> {
        return this.call('deleteWebhook', async () => {
            await this.telegram.deleteWebhook()
        })
    }

    setProfile(profile: BotProfile): Promise<void> {
        const languageCode = profile.language
        return this.call('setProfile', async () => {
            if (profile.commands) {
                await this.telegram.setMyCommands(profile.commands, languageCode ? { language_code: languageCode } : {})
            }
            if (profile.shortDescription !== undefined) {
                await this.telegram.setMyShortDescription(profile.shortDescription, languageCode)
            }
            if (profile.description !== undefined) {
                await this.telegram.setMyDescription(profile.description, languageCode)
            }
            if (profile.name !== undefined) {
                await this.telegram.setMyName(profile.name, languageCode)
            }
        })
    }

    pinMessage(chatId: ChatId, messageId: number): Promise<void> {
        return this.call('pinChatMessage', async () => {
            await this.telegram.pinChatMessage(chatId, messageId, { disable_notification: true })
        })
    }

    unpinMessage(chatId: ChatId, messageId: number): Promise<void> {
        return this.call('unpinChatMessage', async () => {
            await this.telegram.unpinChatMessage(chatId, messageId)
        })
    }

    getPinnedMessageId(chatId: ChatId): Promise<number | null> {
        return this.call('getChat', async () => {
            const chat = await this.telegram.getChat(chatId)
            return 'pinned_message' in chat && chat.pinned_message ? chat.pinned_message.message_id : null
        })
    }
}
