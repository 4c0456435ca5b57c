import type { SqliteDatabase } from '~/config/database'

/**
 * The two split-hash tables. Admin-control tokens live in Messages, read receipts in Reads.
 */
export enum HashTable {
    Messages = 'messages',
    Reads = 'reads',
}

interface HashTableColumns {
    table: string
    prefix: string
    partial: string
    period: string | null
}

const COLUMNS: Record<HashTable, HashTableColumns> = {
    [HashTable.Messages]: {
        table: 'messages',
        prefix: 'prefixed_msg_hash',
        partial: 'partial_msg_hash',
        period: 'year_month',
    },
    [HashTable.Reads]: {
        table: 'reads',
        prefix: 'prefixed_hash',
        partial: 'partial_hash',
        period: null,
    },
}

export class SplitHashRepository {
    constructor(private readonly db: SqliteDatabase) {}

    /**
     * Insert a stored portion; false on prefix collision (never overwrites).
     * The period tag is only kept for tables that have a period column.
     */
    insert(table: HashTable, prefix: string, partial: string, periodTag?: string): boolean {
        const cols = COLUMNS[table]
        const result = cols.period
            ? this.db
                  .prepare(
                      `INSERT OR IGNORE INTO ${cols.table} (${cols.prefix}, ${cols.partial}, ${cols.period}) VALUES (?, ?, ?)`
                  )
                  .run(prefix, partial, periodTag ?? null)
            : this.db
                  .prepare(`INSERT OR IGNORE INTO ${cols.table} (${cols.prefix}, ${cols.partial}) VALUES (?, ?)`)
                  .run(prefix, partial)
        return result.changes > 0
    }

    findPartial(table: HashTable, prefix: string): string | null {
        const cols = COLUMNS[table]
        const row = this.db
            .prepare<[string], { partial: string }>(
                `SELECT ${cols.partial} AS partial FROM ${cols.table} WHERE ${cols.prefix} = ?`
            )
            .get(prefix)
        return row?.partial ?? null
    }

    delete(table: HashTable, prefix: string): boolean {
        const cols = COLUMNS[table]
        const result = this.db.prepare(`DELETE FROM ${cols.table} WHERE ${cols.prefix} = ?`).run(prefix)
        return result.changes > 0
    }

    /**
     * Retention sweep for admin-control records older than a YYYY-MM tag
     */
    purgeBefore(periodTag: string): number {
        const cols = COLUMNS[HashTable.Messages]
        const result = this.db
            .prepare(`DELETE FROM ${cols.table} WHERE ${cols.period} IS NOT NULL AND ${cols.period} < ?`)
            .run(periodTag)
        return result.changes
    }
}
