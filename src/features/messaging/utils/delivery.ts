import type { Logger } from 'pino'
import { TransportError } from '~/core/errors'
import type { BotTransport, ChatId, SendOptions, SentMessage } from '~/core/types/telegram'

export interface ContentSource {
    fromChatId: ChatId
    messageId: number
    /** Plain text re-sent when the message itself cannot be copied or forwarded */
    fallbackText?: string
}

function isUndeliverableContent(error: unknown): boolean {
    return error instanceof TransportError && error.kind === 'bad_request'
}

/**
 * Copy a message, degrading to its text when Telegram refuses the copy
 */
export async function copyWithFallback(
    transport: BotTransport,
    toChatId: ChatId,
    source: ContentSource,
    options: SendOptions = {}
): Promise<SentMessage> {
    try {
        return await transport.copyMessage(toChatId, source.fromChatId, source.messageId, options)
    } catch (error) {
        if (isUndeliverableContent(error) && source.fallbackText) {
            return transport.sendText(toChatId, source.fallbackText, options)
        }
        throw error
    }
}

/**
 * Forward a message, degrading to its text when forwarding is refused
 */
export async function forwardWithFallback(
    transport: BotTransport,
    toChatId: ChatId,
    source: ContentSource
): Promise<SentMessage> {
    try {
        return await transport.forwardMessage(toChatId, source.fromChatId, source.messageId)
    } catch (error) {
        if (isUndeliverableContent(error) && source.fallbackText) {
            return transport.sendText(toChatId, source.fallbackText)
        }
        throw error
    }
}

/**
 * Await a best-effort call (notices, reactions, cleanup), logging instead of throwing
 */
export async function tolerate(task: Promise<unknown>, logger: Logger, message: string): Promise<boolean> {
    try {
        await task
        return true
    } catch (error) {
        logger.warn({ err: error }, message)
        return false
    }
}
