import fastify from 'fastify'
import helmet from '@fastify/helmet'
import cors from '@fastify/cors'
import sensible from '@fastify/sensible'
import logger from './lib/logger'
import authenticationPlugin from './plugins/authentication'
import registerRoutes from './routes'
import { CSV_CONTENT_TYPE, TSV_CONTENT_TYPE } from './routes/tabular'
import { registerAuditReceivers } from './services/auditService'

export const createApp = () => {
  const app = fastify({ logger })

  app.register(helmet)
  app.register(cors, { origin: false })
  app.register(sensible)
  app.register(authenticationPlugin)

  app.addContentTypeParser([CSV_CONTENT_TYPE, TSV_CONTENT_TYPE], { parseAs: 'string' }, (_request, body, done) => {
    done(null, body)
  })

  const disconnectAuditReceivers = registerAuditReceivers()
  app.addHook('onClose', async () => {
    disconnectAuditReceivers()
  })

  app.get('/health', { config: { public: true } }, async () => ({ status: 'ok' }))

  app.register(registerRoutes)

  return app
}
