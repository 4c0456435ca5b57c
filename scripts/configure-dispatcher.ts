/**
 * One-time setup of the dispatcher bot's name, descriptions and command list per language
 * Run with: npm run configure:dispatcher
 */

import 'dotenv/config'
import { Telegraf } from 'telegraf'
import { env } from '~/config/env'
import { SUPPORTED_LANGUAGES } from '~/config/constants'
import { commandList, t } from '~/core/i18n/responses'
import { TelegrafTransport } from '~/features/runtime/services/telegrafTransport'

async function configureDispatcher(): Promise<void> {
    const transport = new TelegrafTransport(new Telegraf(env.MAIN_BOT_TOKEN).telegram)
    const me = await transport.getMe()
    console.log(`🔧 Configuring @${me.username}...\n`)

    let failures = 0
    for (const language of SUPPORTED_LANGUAGES) {
        const serviceName = env.SERVICE_NAME
        try {
            await transport.setProfile({
                language,
                name: t('dispatcherName', language, { serviceName }),
                description: t('dispatcherDescription', language, { serviceName }),
                shortDescription: t('dispatcherShortDescription', language, { serviceName }),
                commands: commandList('dispatcherCommands', language),
            })
            console.log(`✅ ${language}: profile and commands set`)
        } catch (error) {
            failures++
            console.log(`❌ ${language}: ${error instanceof Error ? error.message : String(error)}`)
        }
    }

    if (failures > 0) {
        console.log(`\n⚠️  ${failures} language(s) failed`)
        process.exit(1)
    }
    console.log('\n🎉 Dispatcher configured')
}

configureDispatcher().catch((error: unknown) => {
    console.error('❌ Configuration failed:', error)
    process.exit(1)
})
