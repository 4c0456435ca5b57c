import type { Message, Update, User } from 'telegraf/types'
import type { InboundCallback, InboundCommand, InboundMessage, InboundUser, ReplyReference } from '~/core/types/telegram'
import { fromTelegramKeyboard } from '~/core/utils/telegramButtons'

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s+([\s\S]*))?$/

export type InboundUpdate =
    | { kind: 'message'; message: InboundMessage }
    | { kind: 'callback'; callback: InboundCallback }

function mapUser(user: User): InboundUser {
    return {
        id: user.id,
        firstName: user.first_name,
        ...(user.last_name ? { lastName: user.last_name } : {}),
        ...(user.username ? { username: user.username } : {}),
        ...(user.language_code ? { languageCode: user.language_code } : {}),
    }
}

/**
 * Parse `/name@bot args`. Commands addressed to another bot are not commands for this one.
 */
export function parseCommand(text: string, botUsername?: string): InboundCommand | undefined {
    const match = COMMAND_PATTERN.exec(text.trim())
    if (!match) return undefined
    const [, name, addressee, args] = match
    if (addressee && botUsername && addressee.toLowerCase() !== botUsername.toLowerCase()) {
        return undefined
    }
    return { name: name.toLowerCase(), args: (args ?? '').trim() }
}

function textOf(message: Message): string | undefined {
    if ('text' in message) return message.text
    if ('caption' in message) return message.caption
    return undefined
}

function replyReferenceOf(message: Message): ReplyReference | undefined {
    if (!('reply_to_message' in message) || !message.reply_to_message) {
        return undefined
    }
    const replied = message.reply_to_message
    const text = 'text' in replied ? replied.text : undefined
    return {
        messageId: replied.message_id,
        ...(text !== undefined ? { text } : {}),
        ...(replied.from ? { fromId: replied.from.id } : {}),
    }
}

/**
 * Normalize a raw update into the records flows work with.
 * Updates the relay does not handle (edits, channel posts, service messages) map to null.
 */
export function mapUpdate(update: Update, botUsername?: string): InboundUpdate | null {
    if ('message' in update) {
        const message = update.message
        if (!message.from || message.from.is_bot) return null
        const text = textOf(message)
        const command = 'text' in message ? parseCommand(message.text, botUsername) : undefined
        const replyTo = replyReferenceOf(message)
        return {
            kind: 'message',
            message: {
                chatId: message.chat.id,
                messageId: message.message_id,
                from: mapUser(message.from),
                ...(text !== undefined ? { text } : {}),
                ...(command ? { command } : {}),
                ...(replyTo ? { replyTo } : {}),
            },
        }
    }

    if ('callback_query' in update) {
        const query = update.callback_query
        if (!('data' in query)) return null

        const source = query.message
        // Inaccessible messages carry date 0 and no content
        const message =
            source && source.date !== 0 && 'message_id' in source
                ? {
                      chatId: source.chat.id,
                      messageId: source.message_id,
                      ...('text' in source ? { text: source.text } : {}),
                      keyboard:
                          'reply_markup' in source && source.reply_markup
                              ? fromTelegramKeyboard(source.reply_markup.inline_keyboard)
                              : [],
                      ...('reply_to_message' in source && source.reply_to_message
                          ? { replyTo: replyReferenceOf(source) }
                          : {}),
                  }
                : undefined

        return {
            kind: 'callback',
            callback: {
                id: query.id,
                data: query.data,
                from: mapUser(query.from),
                ...(message ? { message } : {}),
            },
        }
    }

    return null
}
