/**
 * Update Mapper Unit Tests
 */

import type { Update } from 'telegraf/types'
import { describe, it, expect } from 'vitest'
import { mapUpdate, parseCommand } from '~/features/runtime/utils/updateMapper'

const user = { id: 55, is_bot: false, first_name: 'Sam', language_code: 'fa' }
const chat = { id: 55, type: 'private' as const, first_name: 'Sam' }

describe('parseCommand', () => {
    it('should split name and arguments', () => {
        expect(parseCommand('/register 123:abc')).toEqual({ name: 'register', args: '123:abc' })
        expect(parseCommand('/Start')).toEqual({ name: 'start', args: '' })
    })

    it('should honor the bot suffix', () => {
        expect(parseCommand('/start@relay_bot', 'Relay_Bot')).toEqual({ name: 'start', args: '' })
        expect(parseCommand('/start@other_bot', 'relay_bot')).toBeUndefined()
    })

    it('should ignore plain text', () => {
        expect(parseCommand('hello /start')).toBeUndefined()
    })
})

describe('mapUpdate', () => {
    it('should normalize a text message with its reply reference', () => {
        const update: Update = {
            update_id: 1,
            message: {
                message_id: 10,
                date: 1700000000,
                chat,
                from: user,
                text: 'hello admin',
                reply_to_message: {
                    message_id: 9,
                    date: 1700000000,
                    chat,
                    text: 'earlier',
                },
            },
        }

        expect(mapUpdate(update, 'relay_bot')).toEqual({
            kind: 'message',
            message: {
                chatId: 55,
                messageId: 10,
                from: { id: 55, firstName: 'Sam', languageCode: 'fa' },
                text: 'hello admin',
                replyTo: { messageId: 9, text: 'earlier' },
            },
        })
    })

    it('should skip messages from bots', () => {
        const update: Update = {
            update_id: 2,
            message: { message_id: 11, date: 1700000000, chat, from: { ...user, is_bot: true }, text: 'beep' },
        }

        expect(mapUpdate(update)).toBeNull()
    })

    it('should carry the keyboard of the message a button sits on', () => {
        const update: Update = {
            update_id: 3,
            callback_query: {
                id: 'cb-1',
                chat_instance: 'ci',
                from: user,
                data: 'r|prefix|suffix',
                message: {
                    message_id: 12,
                    date: 1700000000,
                    chat,
                    text: 'reply',
                    reply_markup: { inline_keyboard: [[{ text: '👀 Read', callback_data: 'r|prefix|suffix' }]] },
                },
            },
        }

        expect(mapUpdate(update)).toEqual({
            kind: 'callback',
            callback: {
                id: 'cb-1',
                data: 'r|prefix|suffix',
                from: { id: 55, firstName: 'Sam', languageCode: 'fa' },
                message: {
                    chatId: 55,
                    messageId: 12,
                    text: 'reply',
                    keyboard: [[{ text: '👀 Read', data: 'r|prefix|suffix' }]],
                },
            },
        })
    })

    it('should drop the message of an inaccessible callback', () => {
        const update: Update = {
            update_id: 4,
            callback_query: {
                id: 'cb-2',
                chat_instance: 'ci',
                from: user,
                data: 'r|prefix|suffix',
                message: { message_id: 13, date: 0, chat },
            },
        }

        const mapped = mapUpdate(update)
        expect(mapped?.kind).toBe('callback')
        expect(mapped && mapped.kind === 'callback' ? mapped.callback.message : 'wrong kind').toBeUndefined()
    })
})
