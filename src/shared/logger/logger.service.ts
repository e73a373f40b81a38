import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

import type { LoggingConfig, LogLevelName } from '../../config'

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel[]> = {
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  verbose: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
}

export const resolveLogLevels = (level: LogLevelName | undefined): LogLevel[] =>
  LEVELS_BY_NAME[level ?? 'info']

/**
 * Application logger
 *
 * Nest's console logger filtered by LOG_LEVEL. Installed with
 * `app.useLogger()`, so every `new Logger(Class.name)` writes through it.
 */
@Injectable()
export class AppLogger extends ConsoleLogger {
  constructor(configService: ConfigService) {
    super('App', {
      logLevels: resolveLogLevels(configService.getOrThrow<LoggingConfig>('config.logging').level),
      timestamp: true,
    })
  }
}
