import { plainToClass } from 'class-transformer'
import {
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator'

/**
 * Environment Variables Validation Schema
 *
 * Validates that the environment variables the service reads are correctly typed.
 * The application will fail to start if validation fails.
 */

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
  Staging = 'staging',
}

// Flags are read as the exact strings 'true' / 'false'
const BOOLEAN_FLAGS = ['true', 'false']

class EnvironmentVariables {
  // Service Info
  @IsString()
  @IsOptional()
  SERVICE_NAME?: string

  // Application
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV?: Environment

  @IsInt()
  @Min(1)
  @Max(65_535)
  @IsOptional()
  PORT?: number

  @IsString()
  @IsOptional()
  API_PREFIX?: string

  @IsString()
  @IsOptional()
  CORS_ORIGIN?: string

  @IsString()
  @IsOptional()
  BODY_LIMIT?: string

  // RabbitMQ
  // Unset or empty falls back to the local default broker
  @Matches(/^amqps?:\/\//, { message: 'RABBITMQ_URL must be an amqp:// or amqps:// URL' })
  @ValidateIf((env: EnvironmentVariables) => Boolean(env.RABBITMQ_URL))
  RABBITMQ_URL?: string

  @IsString()
  @IsOptional()
  ORDER_EVENTS_EXCHANGE?: string

  @IsInt()
  @Min(1)
  @IsOptional()
  AMQP_CONNECT_TIMEOUT_MS?: number

  @IsIn(BOOLEAN_FLAGS)
  @IsOptional()
  ENABLE_MESSAGING?: string

  @IsIn(['ignore', 'reject'])
  @IsOptional()
  PUBLISH_FAILURE_POLICY?: string

  // Metrics
  @IsIn(BOOLEAN_FLAGS)
  @IsOptional()
  METRICS_ENABLED?: string

  // Logging
  @IsIn(['error', 'warn', 'info', 'debug', 'verbose'])
  @IsOptional()
  LOG_LEVEL?: string
}

/**
 * Validate environment variables
 *
 * @param config - Raw environment variables
 * @returns Validated configuration
 */
export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToClass(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  })

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  })

  if (errors.length > 0) {
    throw new Error(errors.toString())
  }

  return validatedConfig
}
