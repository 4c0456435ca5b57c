/**
 * Telegram Relay Types
 *
 * The narrow transport surface the relay uses and the normalized inbound records
 * the routing layer works on. Flows never see raw Bot API objects.
 */

import type { ReactionTypeEmoji } from 'telegraf/types'
import type { Language } from '~/config/constants'
import type { InlineKeyboard } from '~/core/utils/telegramButtons'

/**
 * Telegram chat or user id. Private chats share the user's id.
 */
export type ChatId = number

export interface SendOptions {
    keyboard?: InlineKeyboard
    /** Thread the message onto this message id; delivered unthreaded if it is gone */
    replyToMessageId?: number
    parseMode?: 'HTML'
    disableNotification?: boolean
    disableLinkPreview?: boolean
}

export interface EditTextOptions {
    keyboard?: InlineKeyboard
    parseMode?: 'HTML'
}

export interface SentMessage {
    messageId: number
    chatId: ChatId
}

export interface BotIdentity {
    id: number
    username: string
    firstName: string
}

export interface BotCommand {
    command: string
    description: string
}

export interface BotProfile {
    language?: Language
    commands?: BotCommand[]
    shortDescription?: string
    description?: string
    name?: string
}

/** Emoji Telegram accepts as a message reaction */
export type ReactionEmoji = ReactionTypeEmoji['emoji']

export type SubscribedUpdate = 'message' | 'callback_query'

export interface WebhookOptions {
    secretToken: string
    allowedUpdates: readonly SubscribedUpdate[]
    dropPendingUpdates?: boolean
}

/**
 * Outbound Bot API calls consumed by the relay. Every method may reject with a TransportError.
 */
export interface BotTransport {
    sendText(chatId: ChatId, text: string, options?: SendOptions): Promise<SentMessage>
    copyMessage(toChatId: ChatId, fromChatId: ChatId, messageId: number, options?: SendOptions): Promise<SentMessage>
    forwardMessage(toChatId: ChatId, fromChatId: ChatId, messageId: number): Promise<SentMessage>
    editText(chatId: ChatId, messageId: number, text: string, options?: EditTextOptions): Promise<void>
    editKeyboard(chatId: ChatId, messageId: number, keyboard: InlineKeyboard): Promise<void>
    setReaction(chatId: ChatId, messageId: number, emoji: ReactionEmoji): Promise<void>
    deleteMessage(chatId: ChatId, messageId: number): Promise<void>
    answerCallback(callbackId: string, text?: string, showAlert?: boolean): Promise<void>

    getMe(): Promise<BotIdentity>
    getWebhookUrl(): Promise<string>
    setWebhook(url: string, options: WebhookOptions): Promise<void>
    deleteWebhook(): Promise<void>
    setProfile(profile: BotProfile): Promise<void>

    pinMessage(chatId: ChatId, messageId: number): Promise<void>
    unpinMessage(chatId: ChatId, messageId: number): Promise<void>
    getPinnedMessageId(chatId: ChatId): Promise<number | null>
}

export interface InboundUser {
    id: number
    firstName: string
    lastName?: string
    username?: string
    languageCode?: string
}

export interface InboundCommand {
    /** Command name without the slash or @bot suffix, lowercased */
    name: string
    /** Text after the command */
    args: string
}

/** Message that a message or button replies to */
export interface ReplyReference {
    messageId: number
    text?: string
    /** Sender of the referenced message, when Telegram still has it */
    fromId?: number
}

export interface InboundMessage {
    chatId: ChatId
    messageId: number
    from: InboundUser
    text?: string
    command?: InboundCommand
    replyTo?: ReplyReference
}

export interface InboundCallback {
    id: string
    data: string
    from: InboundUser
    /** Message the button is attached to; absent for inline-mode messages */
    message?: {
        chatId: ChatId
        messageId: number
        text?: string
        keyboard: InlineKeyboard
        replyTo?: ReplyReference
    }
}

/**
 * Everything a flow needs to act on one update for one tenant bot
 */
export interface TenantContext {
    transport: BotTransport
    bot: BotIdentity
    /** Credential token of the bot that received the update */
    token: string
}
