import { Inject, Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

import type { MessagingConfig } from '../../config'
import {
  AMQP_CONNECT,
  BrokerChannel,
  BrokerConnect,
  BrokerConnection,
} from './broker.types'

/**
 * Raised when a connection to the broker cannot be opened.
 */
export class BrokerConnectionError extends Error {
  constructor(brokerUrl: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Could not connect to message broker at ${brokerUrl}: ${reason}`, { cause })
    this.name = 'BrokerConnectionError'
  }
}

/**
 * Replace the password in a broker URL so it can be logged.
 */
export const redactBrokerUrl = (url: string): string => {
  try {
    const parsed = new URL(url)
    if (parsed.password) {
      parsed.password = '***'
    }
    return parsed.toString()
  } catch {
    return '<invalid broker url>'
  }
}

/**
 * AMQP Service
 *
 * Opens short-lived RabbitMQ connections. Every unit of work gets its own
 * connection, and the connection is closed on every exit path, including
 * failures inside the work itself.
 *
 * There is no pooling and no reconnection: a request that cannot reach the
 * broker fails fast with BrokerConnectionError.
 */
@Injectable()
export class AmqpService {
  private readonly logger = new Logger(AmqpService.name)
  private readonly messaging: MessagingConfig
  private readonly displayUrl: string

  constructor(
    @Inject(AMQP_CONNECT) private readonly connect: BrokerConnect,
    private readonly configService: ConfigService
  ) {
    this.messaging = this.configService.getOrThrow<MessagingConfig>('config.messaging')
    this.displayUrl = redactBrokerUrl(this.messaging.url)
  }

  /**
   * Run `work` against a channel on a fresh connection.
   *
   * @throws BrokerConnectionError if the connection cannot be opened
   */
  async withChannel<T>(work: (channel: BrokerChannel) => Promise<T>): Promise<T> {
    const connection = await this.open()

    try {
      const channel = await connection.createChannel()
      return await work(channel)
    } finally {
      await this.close(connection)
    }
  }

  /**
   * Check that a connection can be opened, then close it again.
   */
  async ping(): Promise<boolean> {
    try {
      const connection = await this.open()
      await this.close(connection)
      return true
    } catch (error) {
      if (error instanceof BrokerConnectionError) {
        this.logger.warn(error.message)
        return false
      }
      throw error
    }
  }

  private async open(): Promise<BrokerConnection> {
    let connection: BrokerConnection
    try {
      connection = await this.connect(this.messaging.url, {
        timeout: this.messaging.connectTimeoutMs,
      })
    } catch (error) {
      throw new BrokerConnectionError(this.displayUrl, error)
    }

    // amqplib emits 'error' on the connection; without a listener it would crash the process
    connection.on('error', (error) => {
      this.logger.warn(`Broker connection error: ${error.message}`)
    })
    this.logger.debug(`Connected to ${this.displayUrl}`)
    return connection
  }

  private async close(connection: BrokerConnection): Promise<void> {
    try {
      await connection.close()
    } catch (error) {
      this.logger.warn(
        `Failed to close broker connection: ${error instanceof Error ? error.message : String(error)}`
      )
    }
  }
}
