/**
 * Master passphrase bootstrap.
 *
 * The secure config file holds salt(32) || verification(32) where
 * verification = PBKDF2(base64(PBKDF2(passphrase, salt)), salt). The passphrase itself is never
 * stored and never read from the environment; it is typed at process start.
 */

import { pbkdf2, randomBytes, timingSafeEqual } from 'crypto'
import { access, readFile, writeFile } from 'fs/promises'
import { promisify } from 'util'
import inquirer from 'inquirer'
import { PBKDF2_ITERATIONS } from '~/config/constants'
import { SecretConfigError } from '~/core/errors'
import { loggers } from '~/core/utils/logger'

const pbkdf2Async = promisify(pbkdf2)
const logger = loggers.security

const SALT_LENGTH = 32
const KEY_LENGTH = 32
const MIN_PASSPHRASE_LENGTH = 12
const CANCEL_WORDS = new Set(['0', 'exit', 'q'])

/**
 * Interactive prompt used to read the passphrase
 */
export interface SecretPrompt {
    askSecret(message: string): Promise<string>
    notify(message: string): void
}

/**
 * Masked terminal prompt
 */
export class InquirerSecretPrompt implements SecretPrompt {
    async askSecret(message: string): Promise<string> {
        const answers = await inquirer.prompt<{ secret: string }>([
            { type: 'password', name: 'secret', message, mask: '*' },
        ])
        return answers.secret
    }

    notify(message: string): void {
        console.log(message)
    }
}

export interface MasterSecretOptions {
    iterations?: number
    maxAttempts?: number
}

export class MasterSecretService {
    private readonly iterations: number
    private readonly maxAttempts: number

    constructor(
        private readonly configPath: string,
        private readonly prompt: SecretPrompt,
        options: MasterSecretOptions = {}
    ) {
        this.iterations = options.iterations ?? PBKDF2_ITERATIONS
        this.maxAttempts = options.maxAttempts ?? 3
    }

    /**
     * Run first-time setup or verification, returning the verified passphrase.
     *
     * @throws {SecretConfigError} SETUP_CANCELLED, VERIFICATION_FAILED or CORRUPT_CONFIG
     */
    async obtain(): Promise<string> {
        if (await this.configExists()) {
            return this.unlock()
        }
        return this.setup()
    }

    async setup(): Promise<string> {
        this.prompt.notify("Initial setup - please set your encryption password (or enter '0', 'exit' or 'q' to quit).")

        for (;;) {
            const passphrase = await this.prompt.askSecret('Enter new encryption password:')
            if (isCancel(passphrase)) {
                throw new SecretConfigError('Setup cancelled', 'SETUP_CANCELLED')
            }
            if (passphrase.length < MIN_PASSPHRASE_LENGTH) {
                this.prompt.notify(`Password must be at least ${MIN_PASSPHRASE_LENGTH} characters long.`)
                continue
            }

            const confirmation = await this.prompt.askSecret('Confirm encryption password:')
            if (confirmation !== passphrase) {
                this.prompt.notify('Passwords do not match. Please try again.')
                continue
            }

            const salt = randomBytes(SALT_LENGTH)
            const verification = await this.verificationFor(passphrase, salt)
            await writeFile(this.configPath, Buffer.concat([salt, verification]), { mode: 0o600 })
            logger.info({ path: this.configPath }, 'Secure config created')
            return passphrase
        }
    }

    async unlock(): Promise<string> {
        const data = await readFile(this.configPath)
        if (data.length !== SALT_LENGTH + KEY_LENGTH) {
            throw new SecretConfigError(`Secure config ${this.configPath} is corrupt`, 'CORRUPT_CONFIG')
        }
        const salt = data.subarray(0, SALT_LENGTH)
        const expected = data.subarray(SALT_LENGTH)

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            const passphrase = await this.prompt.askSecret("Enter encryption password (or '0', 'exit' or 'q' to quit):")
            if (isCancel(passphrase)) {
                throw new SecretConfigError('Unlock cancelled', 'SETUP_CANCELLED')
            }

            const actual = await this.verificationFor(passphrase, salt)
            if (timingSafeEqual(actual, expected)) {
                logger.info('Master secret verified')
                return passphrase
            }

            const remaining = this.maxAttempts - attempt
            if (remaining > 0) {
                this.prompt.notify(`Invalid password. ${remaining} attempts remaining.`)
            }
        }

        logger.warn({ attempts: this.maxAttempts }, 'Maximum password attempts exceeded')
        throw new SecretConfigError('Maximum password attempts exceeded', 'VERIFICATION_FAILED')
    }

    private async verificationFor(passphrase: string, salt: Buffer): Promise<Buffer> {
        const key = await pbkdf2Async(passphrase, salt, this.iterations, KEY_LENGTH, 'sha256')
        return pbkdf2Async(key.toString('base64'), salt, this.iterations, KEY_LENGTH, 'sha256')
    }

    private async configExists(): Promise<boolean> {
        try {
            await access(this.configPath)
            return true
        } catch {
            return false
        }
    }
}

function isCancel(input: string): boolean {
    return CANCEL_WORDS.has(input.trim().toLowerCase())
}
