import type { Request, RequestHandler } from 'express'

import { MetricsService } from './metrics.service'

const routeOf = (request: Request): string => {
  const route: unknown = request.route
  if (route !== null && typeof route === 'object' && 'path' in route && typeof route.path === 'string') {
    return `${request.baseUrl}${route.path}`
  }
  // Rejected before routing (body parser errors, unknown paths)
  return request.path
}

/**
 * Records count and latency of every HTTP request.
 *
 * Registered as the first Express middleware, so responses written by the
 * body parser's error handler and by Nest's 404 handler are sampled too.
 * The sample is taken when the response finishes, with the status actually sent.
 */
export const httpMetrics =
  (metrics: MetricsService): RequestHandler =>
  (req, res, next) => {
    if (!metrics.enabled) {
      next()
      return
    }

    const startedAt = process.hrtime.bigint()

    res.once('finish', () => {
      const seconds = Number(process.hrtime.bigint() - startedAt) / 1e9
      metrics.recordHttpRequest(req.method, routeOf(req), res.statusCode, seconds)
    })

    next()
  }
