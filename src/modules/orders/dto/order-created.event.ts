import type { OrderDetails } from './order-details'

export const ORDER_CREATED_EVENT = 'order_created'

/**
 * Order Created Event
 *
 * Published to the `order_events` fanout exchange when an order is accepted.
 * Other microservices bind their own queues to the exchange to react to it.
 *
 * Wire format (UTF-8 JSON, keys in this order):
 * {"event":"order_created","order_id":"<uuid>","details":<original body>}
 *
 * Examples:
 * - Inventory service: Reserve stock
 * - Notification service: Send confirmation email
 * - Analytics service: Track order metrics
 */
export class OrderCreatedEvent {
  readonly event: typeof ORDER_CREATED_EVENT
  readonly order_id: string
  readonly details: OrderDetails

  constructor(orderId: string, details: OrderDetails) {
    this.event = ORDER_CREATED_EVENT
    this.order_id = orderId
    this.details = details
  }
}
