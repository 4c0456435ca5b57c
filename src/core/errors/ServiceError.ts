/**
 * Base Service Error Class
 *
 * Provides a standardized error structure for all services.
 *
 * Usage:
 * ```typescript
 * import { ServiceError } from '~/core/errors/ServiceError'
 *
 * export class StoreError extends ServiceError {
 *     constructor(message: string, code: string, cause?: unknown) {
 *         super('Store', message, code, cause)
 *     }
 * }
 *
 * throw new StoreError('Insert failed', 'INSERT_FAILED', error)
 * ```
 */

/**
 * Base ServiceError class with structured error information
 */
export class ServiceError extends Error {
    /**
     * Create a new ServiceError
     *
     * @param serviceName - Name of the service (e.g., 'Correlator', 'Transport', 'Runtime')
     * @param message - Human-readable error message
     * @param code - Machine-readable error code (e.g., 'INVALID_MESSAGE_DATA')
     * @param cause - Original error that caused this error (for error chaining)
     * @param retryable - Whether this error can be retried
     */
    constructor(
        public readonly serviceName: string,
        message: string,
        public readonly code: string,
        public readonly cause?: unknown,
        public readonly retryable: boolean = false
    ) {
        super(message)
        this.name = `${serviceName}Error`

        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor)
        }
    }

    /**
     * Format error for logging
     */
    toJSON() {
        return {
            name: this.name,
            serviceName: this.serviceName,
            message: this.message,
            code: this.code,
            retryable: this.retryable,
            cause: this.cause,
            stack: this.stack,
        }
    }
}
