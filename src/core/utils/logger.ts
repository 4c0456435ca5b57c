/**
 * Structured Logger using Pino
 *
 * Provides production-ready logging with:
 * - Log levels (trace, debug, info, warn, error, fatal)
 * - Structured JSON output in production
 * - Pretty-printed output in development
 * - Module and flow child loggers
 */

import pino from 'pino'
import { env } from '~/config/env'

// Determine if we're in production
const isProduction = env.NODE_ENV === 'production'
const isTest = env.NODE_ENV === 'test'

// Create base logger
export const logger = pino({
    level: env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
    formatters: {
        level: (label) => {
            return { level: label }
        },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Pretty print in development
    transport:
        isProduction || isTest
            ? undefined
            : {
                  target: 'pino-pretty',
                  options: {
                      colorize: true,
                      translateTime: 'SYS:HH:MM:ss',
                      ignore: 'pid,hostname',
                      singleLine: false,
                  },
              },
})

/**
 * Create a child logger with context
 */
export const createContextLogger = (context: Record<string, unknown>) => {
    return logger.child(context)
}

/**
 * Logger for specific modules
 */
export const loggers = {
    app: createContextLogger({ module: 'app' }),
    database: createContextLogger({ module: 'database' }),
    runtime: createContextLogger({ module: 'runtime' }),
    security: createContextLogger({ module: 'security' }),
    server: createContextLogger({ module: 'server' }),
}

/**
 * Create logger for a specific flow (memoized)
 */
const flowLoggerCache = new Map<string, pino.Logger>()

export const createFlowLogger = (flowName: string): pino.Logger => {
    const cached = flowLoggerCache.get(flowName)
    if (cached) {
        return cached
    }

    const flowLogger = createContextLogger({ module: 'flow', flow: flowName })
    flowLoggerCache.set(flowName, flowLogger)
    return flowLogger
}
