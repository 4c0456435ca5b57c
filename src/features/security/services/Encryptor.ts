/**
 * Authenticated encryption for correlation tokens and lookup keys.
 *
 * Envelope: base64( salt(32) || nonce(12) || ChaCha20 ciphertext || Poly1305 tag(16) )
 * The key is PBKDF2-HMAC-SHA256(master secret, salt). Randomized mode draws a fresh salt
 * and nonce per call. Deterministic mode uses a salt derived from the secret and a nonce
 * bound to the plaintext, so equal inputs give equal envelopes and can be looked up.
 */

import { createCipheriv, createDecipheriv, createHmac, pbkdf2, randomBytes, timingSafeEqual } from 'crypto'
import { promisify } from 'util'
import { PBKDF2_ITERATIONS } from '~/config/constants'
import { DecryptionError } from '~/core/errors'

const pbkdf2Async = promisify(pbkdf2)

const ALGORITHM = 'chacha20-poly1305'
const SALT_LENGTH = 32
const NONCE_LENGTH = 12
const TAG_LENGTH = 16
const KEY_LENGTH = 32

export interface EncryptorOptions {
    /** PBKDF2 rounds; tests lower this */
    iterations?: number
}

export class Encryptor {
    private readonly iterations: number
    private readonly deterministicSalt: Buffer
    private deterministicKey: Promise<Buffer> | null = null

    constructor(
        private readonly secret: string,
        options: EncryptorOptions = {}
    ) {
        if (!secret) {
            throw new Error('Encryptor requires a master secret')
        }
        this.iterations = options.iterations ?? PBKDF2_ITERATIONS
        this.deterministicSalt = createHmac('sha256', secret).update('deterministic-salt').digest()
    }

    /**
     * Randomized encryption: never returns the same envelope twice
     */
    async encrypt(plaintext: string): Promise<string> {
        const salt = randomBytes(SALT_LENGTH)
        const key = await this.deriveKey(salt)
        return this.seal(key, salt, randomBytes(NONCE_LENGTH), plaintext)
    }

    /**
     * Deterministic encryption for equality lookups
     */
    async encryptDeterministic(plaintext: string): Promise<string> {
        const key = await this.getDeterministicKey()
        const nonce = createHmac('sha256', key).update(plaintext, 'utf8').digest().subarray(0, NONCE_LENGTH)
        return this.seal(key, this.deterministicSalt, nonce, plaintext)
    }

    /**
     * Decrypt either mode. Fails closed with DecryptionError on any malformed or tampered input.
     */
    async decrypt(encoded: string): Promise<string> {
        const data = Buffer.from(encoded, 'base64')
        if (data.length < SALT_LENGTH + NONCE_LENGTH + TAG_LENGTH || data.toString('base64') !== encoded) {
            throw new DecryptionError('Malformed encrypted envelope')
        }

        const salt = data.subarray(0, SALT_LENGTH)
        const nonce = data.subarray(SALT_LENGTH, SALT_LENGTH + NONCE_LENGTH)
        const ciphertext = data.subarray(SALT_LENGTH + NONCE_LENGTH, data.length - TAG_LENGTH)
        const tag = data.subarray(data.length - TAG_LENGTH)

        const key = timingSafeEqual(salt, this.deterministicSalt)
            ? await this.getDeterministicKey()
            : await this.deriveKey(salt)

        try {
            const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH })
            decipher.setAuthTag(tag)
            return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8')
        } catch (error) {
            throw new DecryptionError('Decryption failed: authentication tag mismatch', error)
        }
    }

    private seal(key: Buffer, salt: Buffer, nonce: Buffer, plaintext: string): string {
        const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH })
        const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
        return Buffer.concat([salt, nonce, ciphertext, cipher.getAuthTag()]).toString('base64')
    }

    private deriveKey(salt: Buffer): Promise<Buffer> {
        return pbkdf2Async(this.secret, salt, this.iterations, KEY_LENGTH, 'sha256')
    }

    private getDeterministicKey(): Promise<Buffer> {
        if (!this.deterministicKey) {
            this.deterministicKey = this.deriveKey(this.deterministicSalt)
        }
        return this.deterministicKey
    }
}
