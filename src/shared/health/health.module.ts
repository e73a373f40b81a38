import { Module } from '@nestjs/common'
import { TerminusModule } from '@nestjs/terminus'

import { AmqpHealthIndicator } from './amqp.health'
import { HealthController } from './health.controller'

/**
 * Health Module
 *
 * Health check endpoints for the microservice, on top of @nestjs/terminus.
 * AmqpService comes from the global MessagingModule.
 */
@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [AmqpHealthIndicator],
})
export class HealthModule {}
