import { Module } from '@nestjs/common'
import { ConfigModule } from '@nestjs/config'

import { environmentConfig, validate } from './config'
import { OrdersModule } from './modules/orders'
import { HealthModule } from './shared/health'
import { LoggerModule } from './shared/logger'
import { MessagingModule } from './shared/messaging'
import { MetricsModule } from './shared/metrics'

/**
 * App Module
 *
 * Root module for the order service.
 *
 * Architecture:
 * - Shared modules (global): Logging, Metrics, Messaging
 * - Infrastructure modules: Health checks, Configuration
 * - Feature modules: Orders
 */
@Module({
  imports: [
    // Configuration
    // Loads and validates environment variables once at startup
    ConfigModule.forRoot({
      isGlobal: true,
      load: [environmentConfig],
      validate,
    }),

    LoggerModule.forRoot(),

    // RabbitMQ publishing
    MessagingModule,

    // Liveness and readiness probes for orchestrators
    HealthModule,

    // Prometheus-compatible metrics collection
    MetricsModule,

    OrdersModule,
  ],
})
export class AppModule {}
