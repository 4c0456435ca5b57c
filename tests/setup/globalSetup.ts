/**
 * Global setup for Vitest
 * Placeholder configuration so ~/config/env validates without a real .env
 */
import { config } from 'dotenv'

process.env.NODE_ENV = 'test'
process.env.MAIN_BOT_TOKEN = '100000:dispatcher-test-token'
process.env.WEBHOOK_BASE_URL = 'https://relay.example.test'
process.env.TG_SECRET_TOKEN = 'test-secret'
process.env.DATABASE_PATH = ':memory:'
process.env.SECURE_CONFIG_PATH = 'config.test.secure'

// Values above win; .env only fills what is still unset
config()
