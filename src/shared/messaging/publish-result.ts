/**
 * Why a publish did not reach the broker.
 *
 * - messaging_disabled: ENABLE_MESSAGING=false, nothing was attempted
 * - broker_unreachable: the connection could not be opened
 * - publish_failed: the connection opened but the channel, exchange
 *   declaration or publish failed
 */
export type PublishFailureReason = 'messaging_disabled' | 'broker_unreachable' | 'publish_failed'

export type PublishResult =
  | { readonly published: true; readonly exchange: string }
  | {
      readonly published: false
      readonly reason: PublishFailureReason
      readonly detail: string
    }

export const published = (exchange: string): PublishResult => ({ published: true, exchange })

export const notPublished = (reason: PublishFailureReason, detail: string): PublishResult => ({
  published: false,
  reason,
  detail,
})
