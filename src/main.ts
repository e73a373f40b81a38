import 'reflect-metadata'

import { ConfigService } from '@nestjs/config'
import { NestFactory } from '@nestjs/core'

import { AppModule } from './app.module'
import type { HttpConfig, ServiceConfig } from './config'
import { setupApp } from './setup-app'
import { AppLogger } from './shared/logger'

/**
 * Bootstrap the order service
 *
 * Setup process:
 * 1. Create NestJS application (body parsing is registered by setupApp)
 * 2. Configure logger
 * 3. Register the HTTP pipeline (body parsing, error handling, metrics)
 * 4. Start listening on configured port
 */
async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
    bodyParser: false,
  })

  const configService = app.get(ConfigService)
  const http = configService.getOrThrow<HttpConfig>('config.app')
  const service = configService.getOrThrow<ServiceConfig>('config.service')

  const logger = app.get(AppLogger)
  logger.setContext('Bootstrap')
  app.useLogger(logger)

  setupApp(app)

  // Closes the HTTP server on SIGTERM/SIGINT; broker connections are per request
  app.enableShutdownHooks()

  await app.listen(http.port)

  const baseUrl = `http://localhost:${http.port}`
  const fullUrl = http.apiPrefix ? `${baseUrl}/${http.apiPrefix}` : baseUrl
  logger.log(`${service.name} v${service.version} is running on: ${fullUrl}`)
  logger.log(`Metrics available at: ${baseUrl}/metrics`)
  logger.log(`Health check available at: ${baseUrl}/health`)
}

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason)
})

bootstrap().catch((error: unknown) => {
  console.error('Failed to start application:', error)
  process.exitCode = 1
})
