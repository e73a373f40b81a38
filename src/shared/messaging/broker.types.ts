import type { Options } from 'amqplib'

/**
 * The slice of an amqplib channel the producer uses.
 */
export interface BrokerChannel {
  assertExchange(
    exchange: string,
    type: string,
    options?: Options.AssertExchange
  ): Promise<unknown>
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: Options.Publish
  ): boolean
  close(): Promise<void>
}

/**
 * The slice of an amqplib connection the producer uses.
 */
export interface BrokerConnection {
  createChannel(): Promise<BrokerChannel>
  close(): Promise<void>
  on(event: 'error', listener: (error: Error) => void): unknown
}

export interface BrokerSocketOptions {
  timeout?: number
}

/**
 * Signature of amqplib's `connect`, injected under AMQP_CONNECT so tests can
 * swap the broker for an in-process fake.
 */
export type BrokerConnect = (
  url: string,
  socketOptions?: BrokerSocketOptions
) => Promise<BrokerConnection>

export const AMQP_CONNECT = Symbol('AMQP_CONNECT')

// AMQP basic.properties delivery-mode: 1 = transient, 2 = persistent
export const TRANSIENT_DELIVERY_MODE = 1
