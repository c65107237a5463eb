import { connect } from 'amqplib'
import type { Channel } from 'amqplib'
import env from '../config'
import logger from '../lib/logger'

const EXCHANGE_NAME = 'transect_events'
const ROUTING_PREFIX = 'worktracking.'

export type WorktrackingEvent = {
  name: string
  payload: Record<string, unknown>
}

type RabbitConnection = Awaited<ReturnType<typeof connect>>

class EventPublisher {
  private connection: RabbitConnection | null = null
  private channel: Channel | null = null

  async publish(event: WorktrackingEvent): Promise<void> {
    if (!env.RABBITMQ_URL) {
      logger.debug({ event }, 'Skipping event publish because RABBITMQ_URL is not configured')
      return
    }

    const channel = await this.getChannel(env.RABBITMQ_URL)
    if (!channel) {
      logger.error({ event }, 'Unable to publish event: channel is not available')
      return
    }

    const routingKey = `${ROUTING_PREFIX}${event.name}`
    try {
      await channel.assertExchange(EXCHANGE_NAME, 'topic', { durable: true })
      channel.publish(EXCHANGE_NAME, routingKey, Buffer.from(JSON.stringify(event.payload)), {
        contentType: 'application/json',
        persistent: true,
      })
      logger.info({ routingKey }, 'Published worktracking event')
    } catch (error: unknown) {
      logger.error({ error, routingKey }, 'Failed to publish worktracking event')
    }
  }

  async close(): Promise<void> {
    const connection = this.connection
    this.connection = null
    this.channel = null
    if (connection) {
      await connection.close()
    }
  }

  private async getChannel(url: string): Promise<Channel | null> {
    try {
      const connection = this.connection ?? (await this.openConnection(url))

      if (!this.channel) {
        this.channel = await connection.createChannel()
      }

      return this.channel
    } catch (error: unknown) {
      logger.error({ error }, 'Failed to connect to RabbitMQ')
      this.connection = null
      this.channel = null
      return null
    }
  }

  private async openConnection(url: string): Promise<RabbitConnection> {
    const connection = await connect(url)
    connection.on('close', () => {
      logger.warn('RabbitMQ connection closed, resetting channel')
      this.connection = null
      this.channel = null
    })
    connection.on('error', (error: Error) => {
      logger.error({ error }, 'RabbitMQ connection error')
    })
    this.connection = connection
    return connection
  }
}

const publisher = new EventPublisher()
export default publisher
