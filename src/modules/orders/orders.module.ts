import { Module } from '@nestjs/common'

import { OrdersController } from './controllers'
import { OrdersService } from './services'

/**
 * Orders Module
 *
 * - REST API endpoint (OrdersController)
 * - Order acceptance and event publishing (OrdersService)
 *
 * MessagingModule and MetricsModule are global and need no import here.
 */
@Module({
  controllers: [OrdersController],
  providers: [OrdersService],
})
export class OrdersModule {}
