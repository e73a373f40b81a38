export * from './amqp.service'
export * from './broker.types'
export * from './message-producer.service'
export * from './messaging.module'
export * from './publish-result'
