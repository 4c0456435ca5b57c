/**
 * Encrypted Key-Value Store
 *
 * Durable state for tenant registrations, block entries and split-hash records.
 * Lookup fields are encrypted deterministically before they reach SQL, so the database
 * only ever holds ciphertext and equality queries still work.
 */

import type { SqliteDatabase } from '~/config/database'
import { BlockRepository } from '~/database/repositories/blockRepository'
import { HashTable, SplitHashRepository } from '~/database/repositories/splitHashRepository'
import { TenantRepository } from '~/database/repositories/tenantRepository'
import type { Encryptor } from '~/features/security/services/Encryptor'
import { LruCache } from '~/core/utils/lruCache'
import { loggers } from '~/core/utils/logger'

const logger = loggers.database

export { HashTable }

export interface EncryptedStoreOptions {
    adminCacheSize?: number
}

export class EncryptedStore {
    private readonly tenants: TenantRepository
    private readonly blocks: BlockRepository
    private readonly hashes: SplitHashRepository
    // botUsername -> adminId, hit on every anonymous dispatch
    private readonly adminCache: LruCache<string, number>

    constructor(
        db: SqliteDatabase,
        private readonly encryptor: Encryptor,
        options: EncryptedStoreOptions = {}
    ) {
        this.tenants = new TenantRepository(db)
        this.blocks = new BlockRepository(db)
        this.hashes = new SplitHashRepository(db)
        this.adminCache = new LruCache(options.adminCacheSize ?? 1000)
    }

    // ===== SPLIT HASHES =====

    async storeSplitHash(prefix: string, storedPortion: string, table: HashTable, periodTag?: string): Promise<boolean> {
        const stored = this.hashes.insert(table, prefix, storedPortion, periodTag)
        if (!stored) {
            logger.warn({ table }, 'Split hash prefix collision, record not stored')
        }
        return stored
    }

    async getFullHashByPrefix(prefix: string, suffix: string, table: HashTable): Promise<string | null> {
        const partial = this.hashes.findPartial(table, prefix)
        return partial === null ? null : partial + suffix
    }

    async removePartialHash(prefix: string, table: HashTable): Promise<boolean> {
        return this.hashes.delete(table, prefix)
    }

    async purgeMessageHashesBefore(periodTag: string): Promise<number> {
        const removed = this.hashes.purgeBefore(periodTag)
        logger.info({ periodTag, removed }, 'Purged admin-control records')
        return removed
    }

    // ===== TENANTS =====

    /** Register a tenant; false when the token is already registered */
    async addTenantRegistration(credentialToken: string, botUsername: string, adminId: number): Promise<boolean> {
        const [botToken, username, admin] = await Promise.all([
            this.encryptor.encryptDeterministic(credentialToken),
            this.encryptor.encryptDeterministic(botUsername),
            this.encryptor.encryptDeterministic(String(adminId)),
        ])
        const added = this.tenants.insert({ bot_token: botToken, bot_username: username, admin_id: admin })
        if (added) {
            this.adminCache.delete(botUsername)
        }
        return added
    }

    async removeTenantRegistration(encryptedCredentialToken: string): Promise<boolean> {
        const row = this.tenants.findByToken(encryptedCredentialToken)
        if (!row) {
            return false
        }

        try {
            this.adminCache.delete(await this.encryptor.decrypt(row.bot_username))
        } catch (error) {
            // Stale cache entries would outlive the registration, so drop them all
            logger.error({ err: error }, 'Could not decrypt bot username of revoked tenant')
            this.adminCache.clear()
        }
        return this.tenants.deleteByToken(encryptedCredentialToken)
    }

    async removeTenant(credentialToken: string): Promise<boolean> {
        return this.removeTenantRegistration(await this.encryptor.encryptDeterministic(credentialToken))
    }

    async isRegisteredTenant(credentialToken: string): Promise<boolean> {
        return this.tenants.existsByToken(await this.encryptor.encryptDeterministic(credentialToken))
    }

    async isAdmin(userId: number, botUsername?: string): Promise<boolean> {
        const admin = await this.encryptor.encryptDeterministic(String(userId))
        const username = botUsername ? await this.encryptor.encryptDeterministic(botUsername) : undefined
        return this.tenants.isAdmin(admin, username)
    }

    async getAdminIdForTenant(botUsername: string): Promise<number | null> {
        const cached = this.adminCache.get(botUsername)
        if (cached !== undefined) {
            return cached
        }

        const encrypted = this.tenants.findAdminIdByUsername(await this.encryptor.encryptDeterministic(botUsername))
        if (encrypted === null) {
            return null
        }

        try {
            const adminId = Number.parseInt(await this.encryptor.decrypt(encrypted), 10)
            if (!Number.isSafeInteger(adminId)) {
                logger.error({ botUsername }, 'Stored admin id is not an integer')
                return null
            }
            this.adminCache.set(botUsername, adminId)
            return adminId
        } catch (error) {
            logger.error({ err: error, botUsername }, 'Failed to decrypt admin id')
            return null
        }
    }

    // ===== BLOCKS =====

    async isUserBlocked(userId: number, botUsername: string): Promise<boolean> {
        return this.blocks.exists(await this.blockRow(userId, botUsername))
    }

    async blockUser(userId: number, botUsername: string): Promise<boolean> {
        return this.blocks.insert(await this.blockRow(userId, botUsername))
    }

    async unblockUser(userId: number, botUsername: string): Promise<boolean> {
        return this.blocks.delete(await this.blockRow(userId, botUsername))
    }

    private async blockRow(userId: number, botUsername: string) {
        const [blockedUserId, username] = await Promise.all([
            this.encryptor.encryptDeterministic(String(userId)),
            this.encryptor.encryptDeterministic(botUsername),
        ])
        return { blocked_user_id: blockedUserId, bot_username: username }
    }
}
