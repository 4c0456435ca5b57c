/**
 * Master Secret Service Unit Tests
 */

import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { SecretConfigError } from '~/core/errors'
import { MasterSecretService, type SecretPrompt } from '~/features/security/services/MasterSecretService'

const PASSPHRASE = 'test-secret-passphrase'

/**
 * Prompt that replays scripted answers and records notices
 */
class ScriptedPrompt implements SecretPrompt {
    notices: string[] = []
    asked = 0

    constructor(private readonly answers: string[]) {}

    async askSecret(_message: string): Promise<string> {
        const answer = this.answers[this.asked++]
        if (answer === undefined) {
            throw new Error('No scripted answer left')
        }
        return answer
    }

    notify(message: string): void {
        this.notices.push(message)
    }
}

describe('MasterSecretService', () => {
    let dir: string
    let configPath: string

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'relay-secret-'))
        configPath = join(dir, 'config.secure')
    })

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true })
    })

    const serviceWith = (prompt: SecretPrompt) => new MasterSecretService(configPath, prompt, { iterations: 1000 })

    describe('setup', () => {
        it('should write salt and verification after a confirmed passphrase', async () => {
            const prompt = new ScriptedPrompt(['too-short', PASSPHRASE, 'mismatch-passphrase', PASSPHRASE, PASSPHRASE])

            const secret = await serviceWith(prompt).obtain()

            expect(secret).toBe(PASSPHRASE)
            expect(prompt.notices).toContain('Password must be at least 12 characters long.')
            expect(prompt.notices).toContain('Passwords do not match. Please try again.')
            expect((await readFile(configPath)).length).toBe(64)
            expect((await stat(configPath)).mode & 0o777).toBe(0o600)
        })

        it('should cancel on a quit word', async () => {
            await expect(serviceWith(new ScriptedPrompt(['q'])).obtain()).rejects.toMatchObject({
                code: 'SETUP_CANCELLED',
            })
        })
    })

    describe('unlock', () => {
        beforeEach(async () => {
            await serviceWith(new ScriptedPrompt([PASSPHRASE, PASSPHRASE])).setup()
        })

        it('should accept the stored passphrase', async () => {
            await expect(serviceWith(new ScriptedPrompt([PASSPHRASE])).obtain()).resolves.toBe(PASSPHRASE)
        })

        it('should allow retries and count down attempts', async () => {
            const prompt = new ScriptedPrompt(['wrong-passphrase-1', PASSPHRASE])

            await expect(serviceWith(prompt).obtain()).resolves.toBe(PASSPHRASE)
            expect(prompt.notices).toEqual(['Invalid password. 2 attempts remaining.'])
        })

        it('should fail after three wrong attempts', async () => {
            const prompt = new ScriptedPrompt(['wrong-1-passphrase', 'wrong-2-passphrase', 'wrong-3-passphrase'])

            const error = await serviceWith(prompt)
                .obtain()
                .catch((err: unknown) => err)

            expect(error).toBeInstanceOf(SecretConfigError)
            expect(error).toMatchObject({ code: 'VERIFICATION_FAILED' })
            expect(prompt.notices).toEqual([
                'Invalid password. 2 attempts remaining.',
                'Invalid password. 1 attempts remaining.',
            ])
        })

        it('should reject a corrupt config file', async () => {
            await writeFile(configPath, Buffer.alloc(10))

            await expect(serviceWith(new ScriptedPrompt([PASSPHRASE])).obtain()).rejects.toMatchObject({
                code: 'CORRUPT_CONFIG',
            })
        })
    })
})
