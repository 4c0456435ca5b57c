/**
 * Correlation tokens for the reply / block / read buttons.
 *
 * A delimited record is encrypted (randomized mode) and split in two: the store keeps
 * everything but the last SPLIT_LENGTH characters, the button keeps the first and last
 * SPLIT_LENGTH characters. Neither half decrypts on its own.
 *
 *   admin control: option|adminId|senderUserId|originalMessageId|timestampNs
 *   read receipt:  senderUserId|messageId|timestampNs
 *   button data:   operation|prefix|suffix
 */

import assert from 'assert/strict'
import { CALLBACKS, SEP, SPLIT_LENGTH } from '~/config/constants'
import { CorrelationError } from '~/core/errors'
import { createFlowLogger } from '~/core/utils/logger'
import { nowNanoseconds, periodTag } from '~/core/utils/helpers'
import type { Encryptor } from '~/features/security/services/Encryptor'
import { HashTable, type EncryptedStore } from '~/features/storage/services/EncryptedStore'

const logger = createFlowLogger('correlator')

export type AnonymousOption = 'NoHistory' | 'WithHistory' | 'Forward'

export interface AdminControlRecord {
    option: string
    adminId: number
    senderUserId: number
    originalMessageId: number
    timestamp: string
}

export interface ReadRecord {
    /** Sender of the message that will receive the read reaction */
    senderUserId: number
    messageId: number
    timestamp: string
}

export interface SplitToken {
    prefix: string
    suffix: string
    storedPortion: string
}

export interface CallbackPayload {
    operation: string
    prefix: string
    suffix: string
}

export interface AdminControlToken {
    blockPayload: string
    answerPayload: string
}

/**
 * Split an encoded token into its button and stored halves
 */
export function splitToken(encoded: string): SplitToken {
    assert.ok(
        encoded.length > SPLIT_LENGTH,
        `Encoded token must be longer than ${SPLIT_LENGTH} characters (got ${encoded.length})`
    )
    return {
        prefix: encoded.slice(0, SPLIT_LENGTH),
        suffix: encoded.slice(-SPLIT_LENGTH),
        storedPortion: encoded.slice(0, -SPLIT_LENGTH),
    }
}

export function buildPayload(operation: string, prefix: string, suffix: string): string {
    return [operation, prefix, suffix].join(SEP)
}

/**
 * Parse `operation|prefix|suffix`; CorrelationError on any other shape
 */
export function parsePayload(payload: string): CallbackPayload {
    const parts = payload.split(SEP)
    if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
        throw new CorrelationError('Callback payload must have operation, prefix and suffix')
    }
    const [operation, prefix, suffix] = parts
    return { operation, prefix, suffix }
}

function parseInteger(field: string, name: string): number {
    if (!/^-?\d+$/.test(field)) {
        throw new CorrelationError(`Field ${name} is not an integer`)
    }
    const value = Number(field)
    if (!Number.isSafeInteger(value)) {
        throw new CorrelationError(`Field ${name} is out of range`)
    }
    return value
}

export class Correlator {
    constructor(
        private readonly encryptor: Encryptor,
        private readonly store: EncryptedStore
    ) {}

    /**
     * Mint the token behind the Block and Answer buttons of one delivered message
     */
    async mintAdminControl(record: Omit<AdminControlRecord, 'timestamp'>): Promise<AdminControlToken> {
        const plaintext = [
            record.option,
            record.adminId,
            record.senderUserId,
            record.originalMessageId,
            nowNanoseconds(),
        ].join(SEP)

        const { prefix, suffix } = await this.persist(plaintext, HashTable.Messages, periodTag())
        return {
            blockPayload: buildPayload(CALLBACKS.ADMIN_BLOCK, prefix, suffix),
            answerPayload: buildPayload(CALLBACKS.ADMIN_ANSWER, prefix, suffix),
        }
    }

    /**
     * Mint the token behind a Read button; returns the button payload
     */
    async mintRead(record: Omit<ReadRecord, 'timestamp'>): Promise<string> {
        const plaintext = [record.senderUserId, record.messageId, nowNanoseconds()].join(SEP)
        const { prefix, suffix } = await this.persist(plaintext, HashTable.Reads)
        return buildPayload(CALLBACKS.READ_MESSAGE, prefix, suffix)
    }

    async resolveAdminControl(payload: string): Promise<{ operation: string; record: AdminControlRecord }> {
        const { operation, prefix, suffix } = parsePayload(payload)
        const fields = await this.reconstruct(prefix, suffix, HashTable.Messages, 5)
        const [option, adminId, senderUserId, originalMessageId, timestamp] = fields
        return {
            operation,
            record: {
                option,
                adminId: parseInteger(adminId, 'adminId'),
                senderUserId: parseInteger(senderUserId, 'senderUserId'),
                originalMessageId: parseInteger(originalMessageId, 'originalMessageId'),
                timestamp,
            },
        }
    }

    async resolveRead(payload: string): Promise<{ prefix: string; record: ReadRecord }> {
        const { prefix, suffix } = parsePayload(payload)
        const [senderUserId, messageId, timestamp] = await this.reconstruct(prefix, suffix, HashTable.Reads, 3)
        return {
            prefix,
            record: {
                senderUserId: parseInteger(senderUserId, 'senderUserId'),
                messageId: parseInteger(messageId, 'messageId'),
                timestamp,
            },
        }
    }

    /** Delete a consumed read-receipt record */
    async consumeRead(prefix: string): Promise<boolean> {
        return this.store.removePartialHash(prefix, HashTable.Reads)
    }

    private async persist(plaintext: string, table: HashTable, tag?: string): Promise<SplitToken> {
        const encoded = await this.encryptor.encrypt(plaintext)
        const token = splitToken(encoded)
        const stored = await this.store.storeSplitHash(token.prefix, token.storedPortion, table, tag)
        if (!stored) {
            throw new CorrelationError(`Could not persist ${table} token`)
        }
        return token
    }

    private async reconstruct(prefix: string, suffix: string, table: HashTable, fieldCount: number): Promise<string[]> {
        const full = await this.store.getFullHashByPrefix(prefix, suffix, table)
        if (full === null) {
            throw new CorrelationError(`No ${table} record for token prefix`)
        }

        let plaintext: string
        try {
            plaintext = await this.encryptor.decrypt(full)
        } catch (error) {
            logger.error({ err: error, table }, 'Token decryption failed')
            throw new CorrelationError('Token decryption failed', error)
        }

        const fields = plaintext.split(SEP)
        if (fields.length !== fieldCount) {
            throw new CorrelationError(`Expected ${fieldCount} fields, got ${fields.length}`)
        }
        return fields
    }
}
