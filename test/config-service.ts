import { ConfigService } from '@nestjs/config'

import { buildConfig } from '../src/config'

/**
 * A ConfigService holding the same `config` namespace the app registers,
 * built from the given variables instead of process.env.
 */
export const createConfigService = (env: NodeJS.ProcessEnv = {}): ConfigService =>
  new ConfigService({ config: buildConfig(env) })
