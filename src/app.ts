import 'dotenv/config'
import { readFileSync } from 'fs'
import type { Server } from 'http'
import { Telegraf } from 'telegraf'
import { z } from 'zod'
import { env } from '~/config/env'
import { closeAllConnections, openDatabase, testConnection } from '~/config/database'
import { TELEGRAM_IP_RANGES } from '~/config/constants'
import { withSmartRetry } from '~/core/utils/flowRetry'
import { loggers } from '~/core/utils/logger'
import { runMigrations } from '~/database/migrations/runMigrations'
import { Correlator } from '~/features/correlation/services/Correlator'
import { createDispatcherRouter } from '~/features/dispatcher/dispatcherRouter'
import { createTenantRouter } from '~/features/messaging/tenantRouter'
import type { Presentation } from '~/features/messaging/types'
import { AdminReplySessionStore } from '~/features/replies/stores/AdminReplySessionStore'
import { TelegrafTransport } from '~/features/runtime/services/telegrafTransport'
import { TelegrafRuntimeFactory } from '~/features/runtime/services/TelegrafRuntimeFactory'
import { TenantRuntimeManager } from '~/features/runtime/services/TenantRuntimeManager'
import { Encryptor } from '~/features/security/services/Encryptor'
import { InquirerSecretPrompt, MasterSecretService } from '~/features/security/services/MasterSecretService'
import { EncryptedStore } from '~/features/storage/services/EncryptedStore'
import { createHttpServer } from '~/server/httpServer'
import { buildBlockList } from '~/server/webhookHandler'

const packageJson = z
    .object({ version: z.string() })
    .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8')))
export const APP_VERSION = packageJson.version

const logger = loggers.app

async function main(): Promise<void> {
    logger.info({ version: APP_VERSION, env: env.NODE_ENV }, 'Starting relay')

    // Step 1: Master secret (interactive; never from the environment)
    const secrets = new MasterSecretService(env.SECURE_CONFIG_PATH, new InquirerSecretPrompt())
    const encryptor = new Encryptor(await secrets.obtain())

    // Step 2: Storage
    const db = openDatabase(env.DATABASE_PATH)
    if (!testConnection(db)) {
        throw new Error(`Database at ${env.DATABASE_PATH} is not usable`)
    }
    runMigrations(db)
    const store = new EncryptedStore(db, encryptor)
    const correlator = new Correlator(encryptor, store)
    const sessions = new AdminReplySessionStore(env.ADMIN_REPLY_TIMEOUT_MS)

    // Step 3: Dispatcher identity, shown in tenant texts
    const dispatcherTransport = new TelegrafTransport(new Telegraf(env.MAIN_BOT_TOKEN).telegram)
    const dispatcher = await withSmartRetry(() => dispatcherTransport.getMe(), { delayMs: 1000 })
    const presentation: Presentation = {
        serviceName: env.SERVICE_NAME,
        projectUrl: env.PROJECT_URL,
        creatorUsername: dispatcher.username,
    }

    // Step 4: Runtimes
    const factory = new TelegrafRuntimeFactory({
        dispatcherToken: env.MAIN_BOT_TOKEN,
        webhookBaseUrl: env.WEBHOOK_BASE_URL,
        secretToken: env.TG_SECRET_TOKEN,
        concurrency: env.TENANT_CONCURRENCY,
        maxPending: env.TENANT_QUEUE_LIMIT,
    })
    const manager = new TenantRuntimeManager(factory, store, { capacity: env.MAX_ACTIVE_TENANTS })
    factory.useRoutes({
        dispatcher: createDispatcherRouter({ lifecycle: manager, store, presentation }),
        tenant: createTenantRouter({
            store,
            correlator,
            sessions,
            replyTimeoutMs: env.ADMIN_REPLY_TIMEOUT_MS,
            presentation,
        }),
    })
    await manager.getOrCreateRuntime(env.MAIN_BOT_TOKEN)

    // Step 5: Webhook front door
    const app = createHttpServer(
        {
            dispatcherToken: env.MAIN_BOT_TOKEN,
            secretToken: env.TG_SECRET_TOKEN,
            allowedSources: env.TELEGRAM_IP_CHECK ? buildBlockList(TELEGRAM_IP_RANGES) : null,
            runtimes: manager,
            tenants: store,
        },
        APP_VERSION
    )
    const server = app.listen(env.PORT, () => {
        logger.info({ port: env.PORT, dispatcher: dispatcher.username }, 'Relay is running')
    })

    registerShutdown(server, async () => {
        await manager.shutdown()
        sessions.clearAll()
        closeAllConnections()
    })
}

function registerShutdown(server: Server, cleanup: () => Promise<void>): void {
    let shuttingDown = false
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        if (shuttingDown) return
        shuttingDown = true
        logger.info({ signal }, 'Shutting down gracefully...')

        server.close()
        try {
            await cleanup()
            process.exit(0)
        } catch (error) {
            logger.error({ err: error }, 'Shutdown did not complete cleanly')
            process.exit(1)
        }
    }

    process.on('SIGINT', (signal) => void shutdown(signal))
    process.on('SIGTERM', (signal) => void shutdown(signal))
}

main().catch((error: unknown) => {
    loggers.app.fatal({ err: error }, 'Fatal error during startup')
    process.exit(1)
})
