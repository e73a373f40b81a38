export * from './order-event-not-published.error'
export * from './orders.service'
