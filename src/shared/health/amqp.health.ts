import { Injectable } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus'

import type { MessagingConfig } from '../../config'
import { AmqpService } from '../messaging/amqp.service'

/**
 * RabbitMQ Health Indicator
 *
 * Used by the readiness probe so the service doesn't receive traffic
 * when it can't reach the broker. Opens and closes one connection per check.
 */
@Injectable()
export class AmqpHealthIndicator extends HealthIndicator {
  private readonly messagingEnabled: boolean

  constructor(
    private readonly amqpService: AmqpService,
    private readonly configService: ConfigService
  ) {
    super()
    this.messagingEnabled =
      this.configService.getOrThrow<MessagingConfig>('config.messaging').enabled
  }

  /**
   * Check broker connectivity
   *
   * @param key - Health check key name
   * @throws HealthCheckError if the broker cannot be reached
   */
  async pingCheck(key: string): Promise<HealthIndicatorResult> {
    if (!this.messagingEnabled) {
      return this.getStatus(key, true, { message: 'Messaging disabled' })
    }

    const reachable = await this.amqpService.ping()
    const result = this.getStatus(key, reachable)

    if (!reachable) {
      throw new HealthCheckError('RabbitMQ is unreachable', result)
    }

    return result
  }
}
