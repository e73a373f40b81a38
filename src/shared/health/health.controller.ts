import { Controller, Get } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus'

import type { ServiceConfig } from '../../config'
import { AmqpHealthIndicator } from './amqp.health'

export interface ServiceStatus {
  status: 'OK'
  service: string
}

/**
 * Health Check Controller
 *
 * Endpoints:
 * - GET /health: Fixed service status, no dependency checks
 * - GET /health/live: Liveness probe (is the service running?)
 * - GET /health/ready: Readiness probe (can the service reach RabbitMQ?)
 */
@Controller('health')
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private memory: MemoryHealthIndicator,
    private amqp: AmqpHealthIndicator,
    private configService: ConfigService
  ) {}

  /**
   * Service status
   *
   * Always 200 with the same body. It deliberately does not check the broker:
   * order submissions keep working while RabbitMQ is down.
   */
  @Get()
  check(): ServiceStatus {
    return {
      status: 'OK',
      service: this.configService.getOrThrow<ServiceConfig>('config.service').name,
    }
  }

  /**
   * Liveness Probe
   *
   * Fails only if the process is truly broken (heap above 300MB).
   */
  @Get('live')
  @HealthCheck()
  checkLiveness() {
    return this.health.check([
      async () => this.memory.checkHeap('memory_heap', 300 * 1024 * 1024),
    ])
  }

  /**
   * Readiness Probe
   *
   * 503 while the broker cannot be reached.
   */
  @Get('ready')
  @HealthCheck()
  checkReadiness() {
    return this.health.check([() => this.amqp.pingCheck('rabbitmq')])
  }
}
