import { INestApplication } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

import type { HttpConfig } from './config'
import { GlobalExceptionFilter } from './shared/filters'
import { jsonBody, jsonBodyErrorHandler, requireJsonBody } from './shared/http'
import { httpMetrics, MetricsService } from './shared/metrics'

/**
 * Apply the HTTP pipeline shared by main.ts and the e2e tests.
 *
 * The application must be created with `bodyParser: false`; JSON parsing is
 * registered here together with its error handler.
 */
export function setupApp(app: INestApplication): void {
  const configService = app.get(ConfigService)
  const http = configService.getOrThrow<HttpConfig>('config.app')

  // First, so that every response below is sampled
  app.use(httpMetrics(app.get(MetricsService)))

  // Health and metrics endpoints stay at the root for probes and scrapers
  if (http.apiPrefix) {
    app.setGlobalPrefix(http.apiPrefix, {
      exclude: ['health', 'health/live', 'health/ready', 'metrics'],
    })
  }

  app.enableCors({
    origin: http.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
  })

  app.use(requireJsonBody)
  app.use(jsonBody(http.bodyLimit))
  app.use(jsonBodyErrorHandler)

  app.useGlobalFilters(new GlobalExceptionFilter())
}
