import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

import type { MessagingConfig } from '../../config'
import { AmqpService, BrokerConnectionError } from './amqp.service'
import { TRANSIENT_DELIVERY_MODE } from './broker.types'
import { notPublished, published, PublishResult } from './publish-result'

/**
 * Message Producer Service
 *
 * Publishes messages to RabbitMQ fanout exchanges for inter-service communication.
 * A fanout exchange copies every message to every bound queue; the routing key is ignored.
 *
 * Delivery is fire-and-forget:
 * - The exchange is durable, the messages are transient
 * - No publisher confirms, no retry
 * - Broker failures are returned as a PublishResult, never thrown
 *
 * Usage:
 * ```typescript
 * const result = await this.producer.publish('order_events', {
 *   event: 'order_created',
 *   order_id: '3f1c...',
 *   details: { sku: 'ABC-1' }
 * })
 * if (!result.published) {
 *   // decide what a lost event means for the caller
 * }
 * ```
 */
@Injectable()
export class MessageProducerService {
  private readonly logger = new Logger(MessageProducerService.name)
  private readonly messagingEnabled: boolean

  constructor(
    private readonly amqpService: AmqpService,
    private readonly configService: ConfigService
  ) {
    this.messagingEnabled =
      this.configService.getOrThrow<MessagingConfig>('config.messaging').enabled
  }

  /**
   * Publish a message to a fanout exchange
   *
   * Declares the exchange (fanout, durable) before publishing so the first
   * publish works against an empty broker.
   *
   * @param exchange - Exchange name (e.g., 'order_events')
   * @param data - Message payload (will be JSON serialized)
   */
  async publish<T = unknown>(exchange: string, data: T): Promise<PublishResult> {
    if (!this.messagingEnabled) {
      this.logger.debug(`Messaging disabled, not publishing to ${exchange}`)
      return notPublished('messaging_disabled', 'Messaging is disabled')
    }

    const content = Buffer.from(JSON.stringify(data), 'utf8')

    try {
      await this.amqpService.withChannel(async (channel) => {
        await channel.assertExchange(exchange, 'fanout', { durable: true })
        channel.publish(exchange, '', content, {
          deliveryMode: TRANSIENT_DELIVERY_MODE,
          contentType: 'application/json',
        })
      })
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error)
      this.logger.warn(`${detail}. Message to ${exchange} was not published.`)

      return notPublished(
        error instanceof BrokerConnectionError ? 'broker_unreachable' : 'publish_failed',
        detail
      )
    }

    this.logger.debug(`Published ${content.length} bytes to ${exchange}`)
    return published(exchange)
  }
}
