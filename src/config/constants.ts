/**
 * Protocol constants shared by the correlation tokens, button payloads and webhook front door.
 */

/** Field delimiter for plaintext records and button payloads. Never appears in numeric fields. */
export const SEP = '|'

/** Characters of an encrypted token kept by the client on each side of the split */
export const SPLIT_LENGTH = 30

/** Telegram rejects callback_data longer than this many bytes */
export const CALLBACK_DATA_MAX_BYTES = 64

export const PBKDF2_ITERATIONS = 100_000

export const SUPPORTED_LANGUAGES = ['en', 'fa'] as const
export type Language = (typeof SUPPORTED_LANGUAGES)[number]

export const CALLBACKS = {
    ANON_NO_HISTORY: `SendAnon${SEP}NoHistory`,
    ANON_WITH_HISTORY: `SendAnon${SEP}WithHistory`,
    ANON_FORWARD: `SendAnon${SEP}Forward`,
    ADMIN_BLOCK: 'b',
    ADMIN_ANSWER: 'a',
    ADMIN_CANCEL_ANSWER: 'CancelReplyAnswer',
    READ_MESSAGE: 'r',
} as const

export const ANON_CHOICE_PREFIX = `SendAnon${SEP}`

export const EMOJI = {
    NO_HISTORY: '😶‍🌫️',
    WITH_HISTORY: '😶‍🌫️💬',
    FORWARD: '😎',
    READ: '👀',
    BLOCK: '🚫',
    UNBLOCK: '🕊️',
    ANSWER: '👋',
} as const

/** Update types each kind of runtime subscribes to */
export const ALLOWED_UPDATES = {
    tenant: ['message', 'callback_query'],
    dispatcher: ['message'],
} as const

/**
 * Telegram webhook source ranges
 * @see https://core.telegram.org/resources/cidr.txt
 */
export const TELEGRAM_IP_RANGES = [
    '91.108.56.0/22',
    '91.108.4.0/22',
    '91.108.8.0/22',
    '91.108.16.0/22',
    '91.108.12.0/22',
    '149.154.160.0/20',
    '91.105.192.0/23',
    '91.108.20.0/22',
    '185.76.151.0/24',
    '2001:b28:f23d::/48',
    '2001:b28:f23f::/48',
    '2001:67c:4e8::/48',
    '2001:b28:f23c::/48',
    '2a0a:f280::/32',
] as const

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token'
