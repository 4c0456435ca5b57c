import type { TenantContext } from '~/core/types/telegram'
import { createFlowLogger } from '~/core/utils/logger'
import type { UpdateRoute } from '~/features/runtime/types'
import type { InboundUpdate } from '~/features/runtime/utils/updateMapper'
import { handleAdminControl, isAdminControlData } from './flows/AdminControlFlow'
import { handleAnonymousChoice, parseAnonymousOption } from './flows/AnonymousChoiceFlow'
import { handleIncomingMessage } from './flows/IncomingMessageFlow'
import { handleReadReceipt, isReadReceiptData } from './flows/ReadReceiptFlow'
import { handleTenantCommand } from './flows/TenantCommandFlow'
import type { RelayServices } from './types'

const flowLogger = createFlowLogger('tenant-router')

/**
 * Route one tenant bot update to its flow
 */
export function createTenantRouter(services: RelayServices): UpdateRoute {
    return async (update: InboundUpdate, ctx: TenantContext): Promise<void> => {
        if (update.kind === 'message') {
            const { message } = update
            if (message.command) {
                // Unknown commands are ignored, never relayed
                const handled = await handleTenantCommand(message, ctx, services)
                if (!handled) {
                    flowLogger.debug({ bot: ctx.bot.username, command: message.command.name }, 'Unknown command')
                }
                return
            }
            await handleIncomingMessage(message, ctx, services)
            return
        }

        const { callback } = update
        if (parseAnonymousOption(callback.data)) {
            await handleAnonymousChoice(callback, ctx, services)
        } else if (isReadReceiptData(callback.data)) {
            await handleReadReceipt(callback, ctx, services)
        } else if (isAdminControlData(callback.data)) {
            await handleAdminControl(callback, ctx, services)
        } else {
            flowLogger.debug({ bot: ctx.bot.username }, 'Unrecognized callback data')
            await ctx.transport.answerCallback(callback.id)
        }
    }
}
