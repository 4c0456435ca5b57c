import type { SqliteDatabase } from '~/config/database'
import type { BlockRow } from '../schemas/tenant'

export class BlockRepository {
    constructor(private readonly db: SqliteDatabase) {}

    insert(row: BlockRow): boolean {
        const result = this.db
            .prepare('INSERT OR IGNORE INTO blocks (blocked_user_id, bot_username) VALUES (?, ?)')
            .run(row.blocked_user_id, row.bot_username)
        return result.changes > 0
    }

    delete(row: BlockRow): boolean {
        const result = this.db
            .prepare('DELETE FROM blocks WHERE blocked_user_id = ? AND bot_username = ?')
            .run(row.blocked_user_id, row.bot_username)
        return result.changes > 0
    }

    exists(row: BlockRow): boolean {
        const found = this.db
            .prepare('SELECT 1 FROM blocks WHERE blocked_user_id = ? AND bot_username = ?')
            .get(row.blocked_user_id, row.bot_username)
        return found !== undefined
    }
}
