import { Controller, Get, NotFoundException, Res } from '@nestjs/common'
import type { Response } from 'express'

import { MetricsService } from './metrics.service'

/**
 * Prometheus scrape endpoint
 *
 * GET /metrics (excluded from the API prefix)
 */
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metrics: MetricsService) {}

  @Get()
  async scrape(@Res() res: Response): Promise<void> {
    if (!this.metrics.enabled) {
      throw new NotFoundException('Metrics are disabled')
    }

    res.set('Content-Type', this.metrics.registry.contentType)
    res.send(await this.metrics.render())
  }
}
