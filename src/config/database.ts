import Database from 'better-sqlite3'
import { loggers } from '~/core/utils/logger'

export type SqliteDatabase = Database.Database

// One shared connection per storage path
const connections = new Map<string, SqliteDatabase>()

/**
 * Open (or reuse) the connection for a database file.
 *
 * WAL mode plus a busy timeout lets concurrent webhook handlers serialize their writes on the
 * database lock instead of failing under transient contention.
 */
export function openDatabase(path: string): SqliteDatabase {
    const existing = connections.get(path)
    if (existing?.open) {
        return existing
    }

    const db = new Database(path)
    db.pragma('journal_mode = WAL')
    db.pragma('busy_timeout = 5000')
    db.pragma('cache_size = 1000')
    connections.set(path, db)

    loggers.database.info({ path }, 'Database connection opened')
    return db
}

/**
 * Test database connection
 */
export function testConnection(db: SqliteDatabase): boolean {
    try {
        db.prepare('SELECT 1').get()
        return true
    } catch (error) {
        loggers.database.error({ err: error }, 'Database connection failed')
        return false
    }
}

/**
 * Close every pooled connection
 */
export function closeAllConnections(): void {
    for (const [path, db] of connections) {
        if (db.open) {
            db.close()
        }
        loggers.database.info({ path }, 'Database connection closed')
    }
    connections.clear()
}
