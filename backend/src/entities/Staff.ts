import type { Order } from './Order.js';
import { OrderStatus } from '../types/order.js';

/**
 * Cafe staff are the only ones who move an order's status
 */
export class Staff {
  constructor(
    public readonly staffId: number,
    public readonly name: string
  ) {}

  updateOrderStatus(order: Order, status: OrderStatus): void {
    order.updateStatus(status);
  }
}
