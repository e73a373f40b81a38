import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common'

import { OrderAcceptedResponse, OrderDetails } from '../dto'
import { OrdersService } from '../services'

/**
 * Orders Controller
 *
 * Endpoints:
 * - POST /orders: Accept an order and publish order_created
 */
@Controller('orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  /**
   * Accept a new order
   *
   * The body is opaque: any JSON object or array is accepted as-is.
   *
   * Example request:
   * POST /orders
   * {
   *   "customer": "c-42",
   *   "items": [{ "sku": "ABC-1", "quantity": 2 }]
   * }
   *
   * Example response (201):
   * {
   *   "message": "Order placed and is being processed.",
   *   "order_id": "0b6f1e0c-3f0e-4d6b-9a55-2d1c7c0f9a10",
   *   "status": "ACCEPTED"
   * }
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() details: OrderDetails): Promise<OrderAcceptedResponse> {
    return await this.ordersService.create(details)
  }
}
