import type { TenantContext } from '~/core/types/telegram'
import { createFlowLogger } from '~/core/utils/logger'
import type { UpdateRoute } from '~/features/runtime/types'
import type { InboundUpdate } from '~/features/runtime/utils/updateMapper'
import { handleInfoCommand } from './flows/InfoCommandFlow'
import { handleRegister } from './flows/RegisterFlow'
import { handleRevoke } from './flows/RevokeFlow'
import type { DispatcherServices } from './types'

const flowLogger = createFlowLogger('dispatcher-router')

/**
 * The dispatcher only answers commands; plain messages and callbacks are ignored
 */
export function createDispatcherRouter(services: DispatcherServices): UpdateRoute {
    return async (update: InboundUpdate, ctx: TenantContext): Promise<void> => {
        if (update.kind !== 'message' || !update.message.command) {
            return
        }

        const { message } = update
        switch (message.command?.name) {
            case 'register':
                await handleRegister(message, ctx, services)
                return
            case 'revoke':
                await handleRevoke(message, ctx, services)
                return
        }

        if (!(await handleInfoCommand(message, ctx, services))) {
            flowLogger.debug({ command: message.command?.name }, 'Unknown dispatcher command')
        }
    }
}
