import { Global, Module } from '@nestjs/common'
import { connect } from 'amqplib'

import { AmqpService } from './amqp.service'
import { AMQP_CONNECT, BrokerConnect } from './broker.types'
import { MessageProducerService } from './message-producer.service'

const amqpConnect: BrokerConnect = (url, socketOptions) => connect(url, socketOptions)

/**
 * Messaging Module
 *
 * Provides RabbitMQ publishing for inter-service communication.
 * This module is global to allow any module to publish messages.
 *
 * When ENABLE_MESSAGING=false the producer stays registered but reports
 * every publish as `messaging_disabled` without opening a connection.
 *
 * Services provided:
 * - AmqpService: short-lived broker connections
 * - MessageProducerService: publish messages to fanout exchanges
 */
@Global()
@Module({
  providers: [
    { provide: AMQP_CONNECT, useValue: amqpConnect },
    AmqpService,
    MessageProducerService,
  ],
  exports: [AmqpService, MessageProducerService],
})
export class MessagingModule {}
