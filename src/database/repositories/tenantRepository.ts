import type { SqliteDatabase } from '~/config/database'
import type { TenantRow } from '../schemas/tenant'

/**
 * Encrypted tenant registrations. Callers pass ciphertext; this layer never sees plaintext.
 */
export class TenantRepository {
    constructor(private readonly db: SqliteDatabase) {}

    /** Insert a registration; false when the token is already registered */
    insert(row: TenantRow): boolean {
        const result = this.db
            .prepare('INSERT OR IGNORE INTO tenants (bot_token, bot_username, admin_id) VALUES (?, ?, ?)')
            .run(row.bot_token, row.bot_username, row.admin_id)
        return result.changes > 0
    }

    deleteByToken(botToken: string): boolean {
        const result = this.db.prepare('DELETE FROM tenants WHERE bot_token = ?').run(botToken)
        return result.changes > 0
    }

    findByToken(botToken: string): TenantRow | null {
        const row = this.db
            .prepare<[string], TenantRow>('SELECT bot_token, bot_username, admin_id FROM tenants WHERE bot_token = ?')
            .get(botToken)
        return row ?? null
    }

    existsByToken(botToken: string): boolean {
        return this.db.prepare('SELECT 1 FROM tenants WHERE bot_token = ?').get(botToken) !== undefined
    }

    findAdminIdByUsername(botUsername: string): string | null {
        const row = this.db
            .prepare<[string], Pick<TenantRow, 'admin_id'>>('SELECT admin_id FROM tenants WHERE bot_username = ?')
            .get(botUsername)
        return row?.admin_id ?? null
    }

    isAdmin(adminId: string, botUsername?: string): boolean {
        const found = botUsername
            ? this.db.prepare('SELECT 1 FROM tenants WHERE admin_id = ? AND bot_username = ?').get(adminId, botUsername)
            : this.db.prepare('SELECT 1 FROM tenants WHERE admin_id = ?').get(adminId)
        return found !== undefined
    }
}
