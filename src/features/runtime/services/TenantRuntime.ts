import type { Telegraf } from 'telegraf'
import type { Update } from 'telegraf/types'
import { TenantRuntimeError } from '~/core/errors'
import type { BotIdentity, BotTransport, TenantContext } from '~/core/types/telegram'
import { shortenToken } from '~/core/utils/helpers'
import { loggers } from '~/core/utils/logger'
import { UpdateQueue } from '~/core/utils/updateQueue'
import type { RuntimeKind, TenantRuntime, UpdateRoute } from '../types'
import { mapUpdate } from '../utils/updateMapper'

const logger = loggers.runtime

export interface TelegrafTenantRuntimeOptions {
    token: string
    kind: RuntimeKind
    bot: Telegraf
    transport: BotTransport
    identity: BotIdentity
    route: UpdateRoute
    concurrency: number
    maxPending: number
}

/**
 * One Telegraf instance in webhook mode. Updates arrive through enqueue(), pass telegraf's
 * middleware chain, and are normalized before reaching the route.
 */
export class TelegrafTenantRuntime implements TenantRuntime {
    readonly token: string
    readonly kind: RuntimeKind
    readonly identity: BotIdentity
    private readonly bot: Telegraf
    private readonly queue: UpdateQueue<Update>
    private stopped = false

    constructor(options: TelegrafTenantRuntimeOptions) {
        this.token = options.token
        this.kind = options.kind
        this.identity = options.identity
        this.bot = options.bot

        const context: TenantContext = {
            transport: options.transport,
            bot: options.identity,
            token: options.token,
        }
        const log = logger.child({ bot: options.identity.username, kind: options.kind })

        this.bot.use(async (ctx) => {
            const inbound = mapUpdate(ctx.update, options.identity.username)
            if (!inbound) {
                log.debug({ updateId: ctx.update.update_id }, 'Ignoring unsupported update')
                return
            }
            await options.route(inbound, context)
        })
        this.bot.catch((error) => {
            log.error({ err: error }, 'Update handler failed')
        })

        this.queue = new UpdateQueue((update) => this.bot.handleUpdate(update), {
            concurrency: options.concurrency,
            maxPending: options.maxPending,
        })
    }

    get isStopped(): boolean {
        return this.stopped
    }

    enqueue(update: Update): boolean {
        if (this.stopped) return false
        return this.queue.push(update)
    }

    async stop(): Promise<void> {
        if (this.stopped) {
            throw new TenantRuntimeError(`Runtime ${shortenToken(this.token)} already stopped`, 'ALREADY_STOPPED')
        }
        this.stopped = true
        await this.queue.close()
        logger.info({ bot: this.identity.username }, 'Runtime stopped')
    }
}
