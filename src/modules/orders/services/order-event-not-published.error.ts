import type { PublishFailureReason } from '../../../shared/messaging'

/**
 * Thrown under PUBLISH_FAILURE_POLICY=reject when an accepted order's event
 * could not be published. The global exception filter answers it with 500.
 */
export class OrderEventNotPublishedError extends Error {
  constructor(
    readonly orderId: string,
    readonly reason: PublishFailureReason,
    detail: string
  ) {
    super(`order_created event for order ${orderId} was not published (${reason}): ${detail}`)
    this.name = 'OrderEventNotPublishedError'
  }
}
