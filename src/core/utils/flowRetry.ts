/**
 * Retry utility for idempotent setup calls (getMe, webhook binding)
 */

import { ServiceError } from '~/core/errors/ServiceError'
import { classifyTransportError } from '~/core/errors/TransportError'
import { createFlowLogger } from '~/core/utils/logger'

const logger = createFlowLogger('FlowRetry')

export interface RetryOptions {
  maxRetries: number
  delayMs: number
  exponentialBackoff?: boolean
  shouldRetry?: (error: unknown) => boolean
  onRetry?: (attempt: number, error: unknown) => void | Promise<void>
}

/**
 * Retry an async operation with exponential backoff
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxRetries,
    delayMs,
    exponentialBackoff = true,
    shouldRetry = () => true,
    onRetry
  } = options

  let lastError: unknown

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await operation()
    } catch (error) {
      lastError = error

      if (attempt === maxRetries - 1 || !shouldRetry(error)) {
        throw error
      }

      const delay = exponentialBackoff
        ? delayMs * Math.pow(2, attempt)
        : delayMs

      logger.warn(
        { attempt: attempt + 1, maxRetries, delay, err: error },
        'Operation failed, retrying...'
      )

      if (onRetry) {
        await onRetry(attempt + 1, error)
      }

      await new Promise((resolve) => setTimeout(resolve, delay))
    }
  }

  // Unreachable for maxRetries >= 1
  throw lastError
}

/**
 * Check if an error is retryable (transient network/API errors)
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ServiceError) {
    return error.retryable
  }

  const kind = classifyTransportError(error)
  return kind === 'rate_limited' || kind === 'timeout' || kind === 'network'
}

/**
 * Retry only while the error stays transient (3 attempts by default)
 */
export async function withSmartRetry<T>(
  operation: () => Promise<T>,
  options: Omit<RetryOptions, 'maxRetries' | 'shouldRetry'> & { maxRetries?: number }
): Promise<T> {
  return withRetry(operation, {
    ...options,
    maxRetries: options.maxRetries ?? 3,
    shouldRetry: isRetryableError,
  })
}
