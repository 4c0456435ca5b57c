/**
 * Configuration Module
 *
 * Central export point for all configuration.
 *
 * @example
 * ```typescript
 * import { env, openDatabase, CALLBACKS } from '~/config'
 * ```
 */

// Environment variables (validated with Zod)
export { env, type Env } from './env'

// Database connections
export { openDatabase, testConnection, closeAllConnections, type SqliteDatabase } from './database'

// Protocol constants
export * from './constants'
