import express, { type Request, type Response } from 'express'
import { SECRET_HEADER } from '~/config/constants'
import { loggers } from '~/core/utils/logger'
import { handleWebhookRequest, type WebhookGateOptions } from './webhookHandler'

const logger = loggers.server

/**
 * Express app serving `POST /webhook/:token` for every bot this process hosts
 */
export function createHttpServer(gate: WebhookGateOptions, version?: string): express.Express {
    const app = express()
    app.set('trust proxy', true)
    app.use(express.json({ limit: '1mb' }))

    app.post('/webhook/:token', async (req: Request<{ token: string }>, res: Response) => {
        try {
            const result = await handleWebhookRequest(
                {
                    token: req.params.token,
                    clientIp: req.ip,
                    secretHeader: req.get(SECRET_HEADER),
                    body: req.body,
                },
                gate
            )
            res.status(result.httpStatus).json(result.body)
        } catch (error) {
            logger.error({ err: error }, 'Webhook handling failed')
            res.status(500).json({ status: 'error', message: 'Internal error' })
        }
    })

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok', version, timestamp: new Date().toISOString() })
    })

    return app
}
