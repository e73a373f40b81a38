import { randomUUID } from 'node:crypto'

import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

import type { MessagingConfig } from '../../../config'
import { MessageProducerService, PublishResult } from '../../../shared/messaging'
import { MetricsService } from '../../../shared/metrics'
import { OrderAcceptedResponse, OrderCreatedEvent, OrderDetails } from '../dto'
import { OrderEventNotPublishedError } from './order-event-not-published.error'

/**
 * Orders Service
 *
 * Accepts orders and announces them to the rest of the system.
 * Nothing is stored: the order identifier is only a correlation token shared
 * by the HTTP response and the published event.
 *
 * Events published:
 * - order_created on the order_events fanout exchange
 */
@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name)
  private readonly messaging: MessagingConfig

  constructor(
    private readonly messageProducer: MessageProducerService,
    private readonly metrics: MetricsService,
    private readonly configService: ConfigService
  ) {
    this.messaging = this.configService.getOrThrow<MessagingConfig>('config.messaging')
  }

  /**
   * Accept an order
   *
   * 1. Generates a fresh order ID
   * 2. Publishes OrderCreatedEvent (one attempt, no retry)
   * 3. Applies the publish failure policy
   *
   * @param details - Order body exactly as submitted
   * @returns Acceptance response carrying the order ID
   * @throws OrderEventNotPublishedError under the `reject` policy when the broker failed
   */
  async create(details: OrderDetails): Promise<OrderAcceptedResponse> {
    const orderId = randomUUID()
    this.logger.log(`Accepting order ${orderId}`)

    const result = await this.messageProducer.publish(
      this.messaging.exchange,
      new OrderCreatedEvent(orderId, details)
    )
    this.metrics.recordOrderEvent(result.published ? 'published' : result.reason)

    this.handlePublishResult(orderId, result)

    return new OrderAcceptedResponse(orderId)
  }

  private handlePublishResult(orderId: string, result: PublishResult): void {
    if (result.published) {
      this.logger.log(`Published order_created event for order ${orderId}`)
      return
    }

    if (result.reason === 'messaging_disabled') {
      this.logger.debug(`Messaging disabled, no event for order ${orderId}`)
      return
    }

    if (this.messaging.failurePolicy === 'reject') {
      throw new OrderEventNotPublishedError(orderId, result.reason, result.detail)
    }

    // The client still gets 201: delivery is best-effort
    this.logger.warn(
      `Order ${orderId} accepted but its order_created event was lost (${result.reason})`
    )
  }
}
