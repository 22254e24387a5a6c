import type { Order } from './Order.js';

export type PlaceOrderResult =
  | { success: true; message: string }
  | { success: false; error: string };

export class Customer {
  constructor(
    public readonly customerId: number,
    public readonly name: string
  ) {}

  /**
   * Place an order. An empty order is refused.
   */
  placeOrder(order: Order): PlaceOrderResult {
    if (order.isEmpty()) {
      return { success: false, error: 'Cannot place an empty order. Add items first.' };
    }
    return { success: true, message: `Order ${order.orderId} placed by ${this.name}` };
  }
}
