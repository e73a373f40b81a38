import { ArgumentsHost, Catch, ExceptionFilter, HttpException, Logger } from '@nestjs/common'
import type { Request, Response } from 'express'

export const INTERNAL_ERROR_BODY = { message: 'Internal server error' } as const

/**
 * Global Exception Filter
 *
 * - HttpException: status and body are passed through unchanged
 * - Anything else: logged with its stack, answered with a generic 500 body
 *   that leaks no internal details
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name)

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp()
    const response = ctx.getResponse<Response>()
    const request = ctx.getRequest<Request>()

    if (exception instanceof HttpException) {
      const status = exception.getStatus()
      const body = exception.getResponse()
      response
        .status(status)
        .json(typeof body === 'string' ? { statusCode: status, message: body } : body)
      return
    }

    const message = exception instanceof Error ? exception.message : String(exception)
    const stack = exception instanceof Error ? exception.stack : undefined
    this.logger.error(`Error processing ${request.method} ${request.url}: ${message}`, stack)

    response.status(500).json(INTERNAL_ERROR_BODY)
  }
}
