import { createHash, randomBytes } from 'crypto'
import { SUPPORTED_LANGUAGES, type Language } from '~/config/constants'

const BOT_TOKEN_PATTERN = /\d+:[A-Za-z0-9_-]+/

/**
 * Find the first bot token in free text (digits, a colon, then token characters).
 * Returns an empty string when none is present.
 */
export function extractBotToken(text: string): string {
    const match = BOT_TOKEN_PATTERN.exec(text)
    return match ? match[0] : ''
}

/**
 * Render a token for logs: first 3 chars, an ellipsis, last 3 chars
 */
export function shortenToken(token: string): string {
    if (token.length <= 6) {
        return token
    }
    return `${token.slice(0, 3)}…${token.slice(-3)}`
}

export function isSupportedLanguage(code: string): code is Language {
    return SUPPORTED_LANGUAGES.some((lang) => lang === code)
}

/**
 * Normalize a Telegram language_code to a supported language, defaulting to en
 */
export function resolveLanguage(languageCode?: string): Language {
    if (!languageCode) return 'en'
    const base = languageCode.toLowerCase().split('-')[0]
    return isSupportedLanguage(base) ? base : 'en'
}

/**
 * Hashtag-friendly anonymous label.
 *
 * With history the label is `#` + 10 characters derived from the user id and first name,
 * so the same sender keeps the same label. Without history a random seed is mixed in.
 */
export function generateAnonymousId(userId: number, firstName?: string, withHistory = false): string {
    let seed = `${userId}${firstName ?? ''}`
    if (!withHistory) {
        seed = `${seed}_${Date.now()}_${randomBytes(4).toString('hex')}`
    }

    const encoded = createHash('sha256').update(seed).digest('base64url')
    let anonId = encoded.replace(/[^A-Za-z0-9]/g, '').slice(0, 10)

    // First character must be a letter so Telegram treats it as a hashtag
    const first = anonId.charAt(0)
    if (!/[A-Za-z]/.test(first)) {
        const letter = /\d/.test(first) ? String.fromCharCode(97 + Number(first)) : 'a'
        anonId = letter + anonId.slice(1)
    }

    return withHistory ? `#${anonId}` : anonId
}

/**
 * Escape text interpolated into HTML parse-mode messages
 */
export function escapeHtml(text: string): string {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

/**
 * Year-month tag attached to admin-control records (e.g. 2024-05)
 */
export function periodTag(date: Date = new Date()): string {
    const month = String(date.getUTCMonth() + 1).padStart(2, '0')
    return `${date.getUTCFullYear()}-${month}`
}

/**
 * Nanosecond wall-clock timestamp as a decimal string
 */
export function nowNanoseconds(): string {
    return (BigInt(Date.now()) * 1_000_000n + (process.hrtime.bigint() % 1_000_000n)).toString()
}
