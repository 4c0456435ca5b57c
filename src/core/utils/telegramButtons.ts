/**
 * Telegram Button Utilities
 *
 * Typed builders for the inline keyboards the relay attaches to messages.
 * Callback payloads carry correlation tokens, so the 64-byte limit is checked
 * on the UTF-8 length rather than the character count.
 *
 * This module uses **camelCase** for configs and converts to **snake_case**
 * for the Telegram Bot API in createInlineKeyboard():
 * - `{ data: 'value' }` → `{ callback_data: 'value' }`
 * - `{ url: 'https://…' }` → `{ url: 'https://…' }`
 *
 * @module telegramButtons
 */

import type { InlineKeyboardButton } from 'telegraf/types'
import { CALLBACK_DATA_MAX_BYTES } from '~/config/constants'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Inline keyboard button configuration
 */
export type InlineButtonConfig =
    | { text: string; data: string }
    | { text: string; url: string }

/**
 * Inline keyboard layout (2D array of buttons)
 */
export type InlineKeyboard = InlineButtonConfig[][]

// ============================================================================
// Button Builders
// ============================================================================

/**
 * Create an inline keyboard button with callback data
 *
 * @example
 * createCallbackButton('👀 Read', 'r|<prefix>|<suffix>')
 */
export function createCallbackButton(text: string, callbackData: string): InlineButtonConfig {
    validateCallbackData(callbackData)
    return { text, data: callbackData }
}

/**
 * Create an inline keyboard button that opens a URL
 *
 * @example
 * createUrlButton('🟢 Start Using', 'https://t.me/some_bot?start=start')
 */
export function createUrlButton(text: string, url: string): InlineButtonConfig {
    if (!url.startsWith('http://') && !url.startsWith('https://') && !url.startsWith('tg://')) {
        throw new Error('URL must start with http://, https://, or tg://')
    }
    return { text, url }
}

// ============================================================================
// Keyboard Builders
// ============================================================================

/**
 * Create an inline keyboard from button configurations
 *
 * Empty rows are dropped, so a keyboard whose only button was removed
 * becomes `[]` and clears the markup when sent.
 *
 * @throws {Error} If any button is invalid
 */
export function createInlineKeyboard(buttons: InlineKeyboard): InlineKeyboardButton[][] {
    try {
        return buttons
            .filter((row) => row.length > 0)
            .map((row, rowIndex) =>
                row.map((btn, colIndex) => {
                    validateInlineButton(btn, rowIndex, colIndex)
                    if ('data' in btn) {
                        return { text: btn.text, callback_data: btn.data }
                    }
                    return { text: btn.text, url: btn.url }
                })
            )
    } catch (error) {
        if (error instanceof Error) {
            throw new Error(`Failed to create inline keyboard: ${error.message}`)
        }
        throw error
    }
}

/**
 * Convert a Telegram keyboard received on a callback back into button configs.
 * Buttons with other actions (web apps, games) are not produced by the relay and are skipped.
 */
export function fromTelegramKeyboard(keyboard: readonly (readonly InlineKeyboardButton[])[]): InlineKeyboard {
    return keyboard.map((row) =>
        row.flatMap((btn): InlineButtonConfig[] => {
            if ('callback_data' in btn) return [{ text: btn.text, data: btn.callback_data }]
            if ('url' in btn) return [{ text: btn.text, url: btn.url }]
            return []
        })
    )
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Validate callback data length in bytes
 */
export function validateCallbackData(data: string): void {
    const size = Buffer.byteLength(data, 'utf8')
    if (size > CALLBACK_DATA_MAX_BYTES) {
        throw new Error(`Callback data too long (${size} bytes, max ${CALLBACK_DATA_MAX_BYTES})`)
    }
}

/**
 * Validate inline button configuration
 *
 * @throws {Error} If button is invalid
 */
export function validateInlineButton(btn: InlineButtonConfig, rowIndex: number, colIndex: number): void {
    const position = `[row ${rowIndex}, col ${colIndex}]`

    if (!btn.text || btn.text.trim() === '') {
        throw new Error(`Invalid button ${position}: 'text' is required and cannot be empty`)
    }

    if ('data' in btn) {
        validateCallbackData(btn.data)
    } else if (!/^(https?:\/\/|tg:\/\/)/.test(btn.url)) {
        throw new Error(`Invalid button ${position}: 'url' must start with http://, https://, or tg:// (got "${btn.url}")`)
    }
}
