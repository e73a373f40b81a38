import { Injectable } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { Counter, Histogram, Registry } from 'prom-client'

import type { MetricsConfig } from '../../config'
import type { PublishFailureReason } from '../messaging/publish-result'

export type OrderEventOutcome = 'published' | PublishFailureReason

/**
 * Metrics Service
 *
 * Owns a private prom-client registry so several application instances
 * (for example in tests) never collide on metric names.
 *
 * `order_events_total` is the only place that tells a delivered event from
 * a dropped one; the HTTP response is the same in both cases.
 */
@Injectable()
export class MetricsService {
  readonly registry = new Registry()
  readonly enabled: boolean

  private readonly httpRequests = new Counter({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'] as const,
    registers: [this.registry],
  })

  private readonly httpDuration = new Histogram({
    name: 'http_request_duration_seconds',
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [this.registry],
  })

  private readonly orderEvents = new Counter({
    name: 'order_events_total',
    help: 'order_created publish attempts by outcome',
    labelNames: ['outcome'] as const,
    registers: [this.registry],
  })

  constructor(private readonly configService: ConfigService) {
    this.enabled = this.configService.getOrThrow<MetricsConfig>('config.metrics').enabled
  }

  recordHttpRequest(method: string, route: string, statusCode: number, seconds: number): void {
    if (!this.enabled) {
      return
    }
    const labels = { method, route, status_code: String(statusCode) }
    this.httpRequests.inc(labels)
    this.httpDuration.observe(labels, seconds)
  }

  recordOrderEvent(outcome: OrderEventOutcome): void {
    if (!this.enabled) {
      return
    }
    this.orderEvents.inc({ outcome })
  }

  async render(): Promise<string> {
    return this.registry.metrics()
  }
}
