/**
 * Builds tenant runtimes: resolves the bot identity, binds the webhook to this process,
 * and on a fresh binding publishes the localized profile.
 */

import { Telegraf } from 'telegraf'
import { ALLOWED_UPDATES, SUPPORTED_LANGUAGES } from '~/config/constants'
import { TenantRuntimeError, toTransportError } from '~/core/errors'
import { commandList, t } from '~/core/i18n/responses'
import type { BotTransport } from '~/core/types/telegram'
import { withSmartRetry } from '~/core/utils/flowRetry'
import { shortenToken } from '~/core/utils/helpers'
import { loggers } from '~/core/utils/logger'
import type { RouteTable, RuntimeFactory, RuntimeKind, TenantRuntime } from '../types'
import { TelegrafTransport } from './telegrafTransport'
import { TelegrafTenantRuntime } from './TenantRuntime'

const logger = loggers.runtime

export interface TelegrafRuntimeFactoryOptions {
    dispatcherToken: string
    webhookBaseUrl: string
    secretToken: string
    concurrency: number
    maxPending: number
}

export function webhookUrlFor(baseUrl: string, token: string): string {
    return `${baseUrl}/webhook/${token}`
}

export class TelegrafRuntimeFactory implements RuntimeFactory {
    private routes: RouteTable | null = null
    private dispatcherUsername: string | null = null

    constructor(private readonly options: TelegrafRuntimeFactoryOptions) {}

    /**
     * Routes are attached after construction because the dispatcher routes need the manager
     * that owns this factory.
     */
    useRoutes(routes: RouteTable): void {
        this.routes = routes
    }

    async create(token: string): Promise<TenantRuntime> {
        const routes = this.routes
        if (!routes) {
            throw new TenantRuntimeError('Runtime routes are not configured', 'CREATION_FAILED')
        }

        const kind: RuntimeKind = token === this.options.dispatcherToken ? 'dispatcher' : 'tenant'
        const bot = new Telegraf(token)
        const transport = new TelegrafTransport(bot.telegram)

        try {
            const me = await withSmartRetry(
                async () => {
                    try {
                        return await bot.telegram.getMe()
                    } catch (error) {
                        throw toTransportError(error, 'getMe')
                    }
                },
                { delayMs: 500 }
            )
            bot.botInfo = me
            const identity = { id: me.id, username: me.username, firstName: me.first_name }
            if (kind === 'dispatcher') {
                this.dispatcherUsername = me.username
            }

            const newlyBound = await this.bindWebhook(transport, token, kind)
            if (newlyBound) {
                await this.publishProfile(transport, kind, identity.username)
            }

            logger.info({ bot: identity.username, kind, newlyBound }, 'Runtime created')
            return new TelegrafTenantRuntime({
                token,
                kind,
                bot,
                transport,
                identity,
                route: kind === 'dispatcher' ? routes.dispatcher : routes.tenant,
                concurrency: this.options.concurrency,
                maxPending: this.options.maxPending,
            })
        } catch (error) {
            logger.error({ err: error, token: shortenToken(token) }, 'Runtime creation failed')
            const detail = error instanceof Error ? error.message : String(error)
            throw new TenantRuntimeError(detail, 'CREATION_FAILED', error)
        }
    }

    async releaseWebhook(token: string): Promise<void> {
        const transport = new TelegrafTransport(new Telegraf(token).telegram)
        await transport.deleteWebhook()
        logger.info({ token: shortenToken(token) }, 'Webhook released')
    }

    /**
     * Point the bot's webhook at this process. Returns true when it had to be (re)bound.
     */
    private async bindWebhook(transport: BotTransport, token: string, kind: RuntimeKind): Promise<boolean> {
        const url = webhookUrlFor(this.options.webhookBaseUrl, token)
        const current = await withSmartRetry(() => transport.getWebhookUrl(), { delayMs: 500 })
        if (current === url) {
            return false
        }

        if (current) {
            await transport.deleteWebhook()
        }
        await transport.setWebhook(url, {
            secretToken: this.options.secretToken,
            allowedUpdates: ALLOWED_UPDATES[kind],
        })
        return true
    }

    /**
     * Commands and short description per language. Failures are logged, never fatal.
     */
    private async publishProfile(transport: BotTransport, kind: RuntimeKind, botUsername: string): Promise<void> {
        let creatorUsername = botUsername
        if (kind === 'tenant') {
            try {
                creatorUsername = await this.resolveDispatcherUsername()
            } catch (error) {
                logger.warn({ err: error, bot: botUsername }, 'Dispatcher identity unavailable, profile not set')
                return
            }
        }

        for (const language of SUPPORTED_LANGUAGES) {
            try {
                if (kind === 'dispatcher') {
                    await transport.setProfile({ language, commands: commandList('dispatcherCommands', language) })
                } else {
                    await transport.setProfile({
                        language,
                        commands: commandList('tenantCommands', language),
                        shortDescription: t('tenantShortDescription', language, { creatorUsername }),
                    })
                }
            } catch (error) {
                logger.warn({ err: error, bot: botUsername, language }, 'Failed to set bot profile')
            }
        }
    }

    private async resolveDispatcherUsername(): Promise<string> {
        if (this.dispatcherUsername) {
            return this.dispatcherUsername
        }
        const transport = new TelegrafTransport(new Telegraf(this.options.dispatcherToken).telegram)
        const me = await withSmartRetry(() => transport.getMe(), { delayMs: 500 })
        this.dispatcherUsername = me.username
        return me.username
    }
}
