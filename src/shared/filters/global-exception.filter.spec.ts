import { BadRequestException, HttpException, HttpStatus, Logger } from '@nestjs/common'
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host'

import { OrderEventNotPublishedError } from '../../modules/orders/services'
import { GlobalExceptionFilter } from './global-exception.filter'

describe('GlobalExceptionFilter', () => {
  const filter = new GlobalExceptionFilter()
  let response: { status: jest.Mock; json: jest.Mock }
  let host: ExecutionContextHost

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined)
    response = { status: jest.fn(), json: jest.fn() }
    response.status.mockReturnValue(response)
    host = new ExecutionContextHost([{ method: 'POST', url: '/orders' }, response])
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should pass HttpException bodies through', () => {
    filter.catch(new BadRequestException('Bad order'), host)

    expect(response.status).toHaveBeenCalledWith(400)
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 400,
      message: 'Bad order',
      error: 'Bad Request',
    })
  })

  it('should wrap string HttpException responses', () => {
    filter.catch(new HttpException('Gone away', HttpStatus.GONE), host)

    expect(response.status).toHaveBeenCalledWith(410)
    expect(response.json).toHaveBeenCalledWith({ statusCode: 410, message: 'Gone away' })
  })

  it('should answer unexpected errors with a generic 500', () => {
    filter.catch(
      new OrderEventNotPublishedError('o-1', 'broker_unreachable', 'connect ECONNREFUSED'),
      host
    )

    expect(response.status).toHaveBeenCalledWith(500)
    expect(response.json).toHaveBeenCalledWith({ message: 'Internal server error' })
  })

  it('should log unexpected errors with the request line', () => {
    filter.catch(new Error('boom'), host)

    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'Error processing POST /orders: boom',
      expect.any(String)
    )
  })
})
