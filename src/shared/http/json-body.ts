import type { NextFunction, Request, RequestHandler, Response } from 'express'
import { json } from 'express'

export const MALFORMED_JSON_MESSAGE = 'Malformed JSON in request body'

export const NON_JSON_BODY_MESSAGE = 'Request body must be JSON (Content-Type: application/json)'

const JSON_CONTENT_TYPE = 'application/json'

const METHODS_WITH_BODY = new Set(['POST', 'PUT', 'PATCH'])

interface BodyParserError {
  type: string
  status: number
  message: string
}

const isBodyParserError = (error: unknown): error is BodyParserError =>
  error instanceof Error &&
  'type' in error &&
  typeof error.type === 'string' &&
  'status' in error &&
  typeof error.status === 'number'

const badRequest = (message: string) => ({ statusCode: 400, message, error: 'Bad Request' })

/**
 * Rejects requests that carry a body in anything but JSON.
 *
 * The JSON parser skips other content types and leaves `{}` as the body,
 * which would otherwise reach controllers as if the caller had sent it.
 */
export const requireJsonBody: RequestHandler = (req, res, next) => {
  if (!METHODS_WITH_BODY.has(req.method) || req.is(JSON_CONTENT_TYPE)) {
    next()
    return
  }

  res.status(400).json(badRequest(NON_JSON_BODY_MESSAGE))
}

/**
 * JSON body parser for the whole application.
 *
 * Replaces Nest's built-in parser (the app is created with bodyParser: false)
 * so that parse failures can be answered in JSON by jsonBodyErrorHandler.
 */
export const jsonBody = (limit: string): RequestHandler => json({ limit, type: JSON_CONTENT_TYPE })

/**
 * Express error middleware; must be registered right after jsonBody.
 *
 * Malformed JSON gets 400 and never reaches a controller. Other parser
 * failures (too large, bad charset) keep the parser's 4xx status.
 */
export function jsonBodyErrorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
): void {
  if (!isBodyParserError(error)) {
    next(error)
    return
  }

  if (error.type === 'entity.parse.failed') {
    res.status(400).json(badRequest(MALFORMED_JSON_MESSAGE))
    return
  }

  res.status(error.status).json({ statusCode: error.status, message: error.message })
}
