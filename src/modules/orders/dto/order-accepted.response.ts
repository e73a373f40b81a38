export const ORDER_ACCEPTED_MESSAGE = 'Order placed and is being processed.'

/**
 * Body of a 201 response to POST /orders.
 *
 * Identical whether or not the order_created event reached the broker.
 */
export class OrderAcceptedResponse {
  readonly message: string
  readonly order_id: string
  readonly status: 'ACCEPTED'

  constructor(orderId: string) {
    this.message = ORDER_ACCEPTED_MESSAGE
    this.order_id = orderId
    this.status = 'ACCEPTED'
  }
}
