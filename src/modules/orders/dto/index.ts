export * from './order-accepted.response'
export * from './order-created.event'
export * from './order-details'
