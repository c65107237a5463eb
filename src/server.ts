import env from './config'
import { createApp } from './app'
import eventPublisher from './events/eventPublisher'
import logger from './lib/logger'

const start = async () => {
  const app = createApp()
  app.addHook('onClose', async () => {
    await eventPublisher.close()
  })

  try {
    await app.listen({ port: env.PORT, host: '0.0.0.0' })
    logger.info(`Transect admin service running on port ${env.PORT}`)
  } catch (error) {
    logger.error({ error }, 'Failed to start transect admin service')
    process.exit(1)
  }
}

void start()
