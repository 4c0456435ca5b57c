/**
 * Row shapes. Every value is a ciphertext envelope.
 */

export interface TenantRow {
    bot_token: string
    bot_username: string
    admin_id: string
}

export interface BlockRow {
    blocked_user_id: string
    bot_username: string
}
