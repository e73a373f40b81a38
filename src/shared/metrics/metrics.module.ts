import { Global, Module } from '@nestjs/common'

import { MetricsController } from './metrics.controller'
import { MetricsService } from './metrics.service'

/**
 * Metrics Module
 *
 * Prometheus-compatible metrics collection.
 * Global so feature services can record domain counters.
 */
@Global()
@Module({
  controllers: [MetricsController],
  providers: [MetricsService],
  exports: [MetricsService],
})
export class MetricsModule {}
