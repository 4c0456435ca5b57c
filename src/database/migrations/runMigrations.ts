import { readFileSync } from 'fs'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import type { SqliteDatabase } from '~/config/database'
import { loggers } from '~/core/utils/logger'

// Get __dirname equivalent in ES modules
const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

const logger = loggers.database

const MIGRATIONS = ['001_init.sql']

function ensureMigrationsTable(db: SqliteDatabase): void {
    db.exec(`CREATE TABLE IF NOT EXISTS migrations (
        name TEXT PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    )`)
}

/**
 * Check if migration has already been applied
 */
function isMigrationApplied(db: SqliteDatabase, migrationName: string): boolean {
    return db.prepare('SELECT 1 FROM migrations WHERE name = ?').get(migrationName) !== undefined
}

/**
 * Run all database migrations, each inside its own transaction
 */
export function runMigrations(db: SqliteDatabase): void {
    logger.info('Running database migrations')
    ensureMigrationsTable(db)

    for (const migration of MIGRATIONS) {
        if (isMigrationApplied(db, migration)) {
            logger.debug({ migration }, 'Skipping migration (already applied)')
            continue
        }

        const migrationSQL = readFileSync(join(__dirname, migration), 'utf-8')
        const apply = db.transaction(() => {
            db.exec(migrationSQL)
            db.prepare('INSERT INTO migrations (name) VALUES (?)').run(migration)
        })

        try {
            apply()
        } catch (error) {
            logger.error({ err: error, migration }, 'Migration failed')
            throw error
        }
        logger.info({ migration }, 'Migration completed')
    }
}
