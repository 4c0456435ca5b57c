import 'dotenv/config'
import { z } from 'zod'

const booleanFlag = (fallback: 'true' | 'false') =>
    z
        .string()
        .optional()
        .default(fallback)
        .transform((val) => val === 'true')

const envSchema = z.object({
    // Server
    PORT: z.string().default('8000').transform(Number),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).optional(),

    // Telegram
    MAIN_BOT_TOKEN: z.string().min(1, 'Dispatcher bot token is required'),
    WEBHOOK_BASE_URL: z
        .string()
        .url('Webhook base URL must be a valid URL')
        .transform((url) => url.replace(/\/+$/, '')),
    TG_SECRET_TOKEN: z
        .string()
        .regex(/^[A-Za-z0-9_-]{1,256}$/, 'Secret token may only contain A-Z, a-z, 0-9, _ and -'),
    TELEGRAM_IP_CHECK: booleanFlag('true'),

    // Storage
    DATABASE_PATH: z.string().default('DATA.db'),
    SECURE_CONFIG_PATH: z.string().default('config.secure'),

    // Runtime limits
    MAX_ACTIVE_TENANTS: z.string().default('100').transform(Number).pipe(z.number().int().positive()),
    ADMIN_REPLY_TIMEOUT_MS: z
        .string()
        .default(String(20 * 60 * 1000))
        .transform(Number)
        .pipe(z.number().int().positive()),
    TENANT_CONCURRENCY: z.string().default('10').transform(Number).pipe(z.number().int().positive()),
    TENANT_QUEUE_LIMIT: z.string().default('100').transform(Number).pipe(z.number().int().positive()),

    // Presentation
    SERVICE_NAME: z.string().default('Veil'),
    PROJECT_URL: z.string().url().default('https://example.com/veil-relay'),
})

export type Env = z.infer<typeof envSchema>

// Validate and export environment variables
const parsed = envSchema.safeParse(process.env)

if (!parsed.success) {
    console.error('❌ Invalid environment variables:')
    console.error(parsed.error.flatten().fieldErrors)
    throw new Error('Invalid environment variables')
}

export const env = parsed.data
