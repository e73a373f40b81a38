import { ConfigService } from '@nestjs/config'
import { Test } from '@nestjs/testing'

import { createConfigService } from '../../../../test/config-service'
import { FakeBroker } from '../../../../test/fake-broker'
import { AMQP_CONNECT, AmqpService, MessageProducerService } from '../../../shared/messaging'
import { MetricsService } from '../../../shared/metrics'
import { OrderEventNotPublishedError } from './order-event-not-published.error'
import { OrdersService } from './orders.service'

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe('OrdersService', () => {
  let broker: FakeBroker
  let ordersService: OrdersService
  let metrics: MetricsService

  const compile = async (env: NodeJS.ProcessEnv = {}) => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        OrdersService,
        MessageProducerService,
        AmqpService,
        MetricsService,
        { provide: AMQP_CONNECT, useValue: broker.connect },
        { provide: ConfigService, useValue: createConfigService(env) },
      ],
    }).compile()

    ordersService = moduleRef.get(OrdersService)
    metrics = moduleRef.get(MetricsService)
  }

  beforeEach(async () => {
    broker = new FakeBroker()
    await compile()
  })

  describe('create', () => {
    it('should accept the order with a fresh UUID', async () => {
      const response = await ordersService.create({ sku: 'ABC-1', quantity: 2 })

      expect(response).toEqual({
        message: 'Order placed and is being processed.',
        order_id: expect.stringMatching(UUID_V4),
        status: 'ACCEPTED',
      })
    })

    it('should publish an order_created envelope carrying the details unchanged', async () => {
      const details = { customer: 'c-42', items: [{ sku: 'ABC-1', quantity: 2 }], gift: false }

      const response = await ordersService.create(details)

      expect(broker.published).toHaveLength(1)
      expect(broker.published[0].exchange).toBe('order_events')
      expect(broker.envelopes()).toEqual([
        { event: 'order_created', order_id: response.order_id, details },
      ])
    })

    it('should publish to the configured exchange', async () => {
      await compile({ ORDER_EVENTS_EXCHANGE: 'orders_fanout' })

      await ordersService.create({})

      expect(broker.published[0].exchange).toBe('orders_fanout')
    })

    it('should generate a distinct ID for identical submissions', async () => {
      const first = await ordersService.create({ sku: 'ABC-1' })
      const second = await ordersService.create({ sku: 'ABC-1' })

      expect(first.order_id).not.toBe(second.order_id)
      expect(broker.envelopes()).toEqual([
        { event: 'order_created', order_id: first.order_id, details: { sku: 'ABC-1' } },
        { event: 'order_created', order_id: second.order_id, details: { sku: 'ABC-1' } },
      ])
    })

    it('should still accept the order when the broker is unreachable', async () => {
      broker.reachable = false

      const response = await ordersService.create({ sku: 'ABC-1' })

      expect(response.status).toBe('ACCEPTED')
      expect(broker.published).toHaveLength(0)
    })

    it('should count published and dropped events by outcome', async () => {
      await ordersService.create({})
      broker.reachable = false
      await ordersService.create({})

      const exposition = await metrics.render()
      expect(exposition).toContain('order_events_total{outcome="published"} 1')
      expect(exposition).toContain('order_events_total{outcome="broker_unreachable"} 1')
    })
  })

  describe('with PUBLISH_FAILURE_POLICY=reject', () => {
    beforeEach(async () => {
      await compile({ PUBLISH_FAILURE_POLICY: 'reject' })
    })

    it('should throw when the broker is unreachable', async () => {
      broker.reachable = false

      await expect(ordersService.create({})).rejects.toBeInstanceOf(OrderEventNotPublishedError)
    })

    it('should throw when the publish itself fails', async () => {
      broker.publishError = new Error('channel closed')

      await expect(ordersService.create({})).rejects.toMatchObject({ reason: 'publish_failed' })
    })

    it('should accept the order when the event was published', async () => {
      await expect(ordersService.create({})).resolves.toMatchObject({ status: 'ACCEPTED' })
    })

    it('should not throw when messaging is disabled', async () => {
      await compile({ PUBLISH_FAILURE_POLICY: 'reject', ENABLE_MESSAGING: 'false' })

      await expect(ordersService.create({})).resolves.toMatchObject({ status: 'ACCEPTED' })
      expect(broker.connectCalls).toHaveLength(0)
    })
  })
})
