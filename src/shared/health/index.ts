export * from './amqp.health'
export * from './health.controller'
export * from './health.module'
