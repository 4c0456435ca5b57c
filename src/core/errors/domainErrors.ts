import { ServiceError } from './ServiceError'

/**
 * A callback token could not be reconstructed, decrypted or parsed.
 * Always surfaced to the user as "invalid message data", never fatal.
 */
export class CorrelationError extends ServiceError {
    constructor(message: string, cause?: unknown) {
        super('Correlation', message, 'INVALID_MESSAGE_DATA', cause)
    }
}

export type TenantRuntimeErrorCode = 'CREATION_FAILED' | 'ALREADY_STOPPED' | 'OVERLOADED'

export class TenantRuntimeError extends ServiceError {
    constructor(message: string, code: TenantRuntimeErrorCode, cause?: unknown) {
        super('TenantRuntime', message, code, cause, code === 'OVERLOADED')
    }
}

export type SecretConfigErrorCode = 'SETUP_CANCELLED' | 'VERIFICATION_FAILED' | 'CORRUPT_CONFIG'

export class SecretConfigError extends ServiceError {
    constructor(message: string, code: SecretConfigErrorCode, cause?: unknown) {
        super('SecretConfig', message, code, cause)
    }
}

/**
 * Authenticated decryption failed: tampered envelope, wrong key or malformed input
 */
export class DecryptionError extends ServiceError {
    constructor(message: string, cause?: unknown) {
        super('Encryptor', message, 'DECRYPTION_FAILED', cause)
    }
}
