import { DynamicModule, Global, Module } from '@nestjs/common'

import { AppLogger } from './logger.service'

/**
 * Logger Module
 *
 * Registers AppLogger globally; main.ts installs it as the Nest logger.
 */
@Global()
@Module({})
export class LoggerModule {
  static forRoot(): DynamicModule {
    return {
      module: LoggerModule,
      providers: [AppLogger],
      exports: [AppLogger],
    }
  }
}
