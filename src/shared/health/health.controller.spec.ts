import { ConfigService } from '@nestjs/config'
import { HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus'
import { Test, TestingModule } from '@nestjs/testing'

import { createConfigService } from '../../../test/config-service'
import { AmqpHealthIndicator } from './amqp.health'
import { HealthController } from './health.controller'

describe('HealthController', () => {
  let amqpHealth: { pingCheck: jest.Mock }

  const createController = async (env: NodeJS.ProcessEnv = {}) => {
    amqpHealth = { pingCheck: jest.fn() }

    const app: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: ConfigService, useValue: createConfigService(env) },
        { provide: HealthCheckService, useValue: { check: jest.fn() } },
        { provide: MemoryHealthIndicator, useValue: { checkHeap: jest.fn() } },
        { provide: AmqpHealthIndicator, useValue: amqpHealth },
      ],
    }).compile()

    return app.get<HealthController>(HealthController)
  }

  describe('check', () => {
    it('should return the fixed service status', async () => {
      const controller = await createController()

      expect(controller.check()).toEqual({ status: 'OK', service: 'order-service' })
    })

    it('should report the configured service name', async () => {
      const controller = await createController({ SERVICE_NAME: 'checkout-orders' })

      expect(controller.check()).toEqual({ status: 'OK', service: 'checkout-orders' })
    })

    it('should not consult the broker', async () => {
      const controller = await createController()

      controller.check()

      expect(amqpHealth.pingCheck).not.toHaveBeenCalled()
    })
  })
})
