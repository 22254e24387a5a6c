import type { Order } from './Order.js';
import { OrderLineSummary } from '../types/order.js';

export interface BillSummary {
  billId: number;
  orderId: number;
  orderDate: Date;
  issuedAt: Date;
  lines: OrderLineSummary[];
  total: number;
}

/**
 * A bill snapshots the order's lines and total when it is issued.
 * Later changes to the order do not reach an issued bill.
 */
export class Bill {
  public readonly total: number;
  private readonly lineSnapshot: readonly OrderLineSummary[];

  constructor(
    public readonly billId: number,
    public readonly order: Order,
    public readonly issuedAt: Date = new Date()
  ) {
    this.total = order.total();
    this.lineSnapshot = order.describeLines();
  }

  render(): BillSummary {
    return {
      billId: this.billId,
      orderId: this.order.orderId,
      orderDate: new Date(this.order.orderDate.getTime()),
      issuedAt: new Date(this.issuedAt.getTime()),
      lines: this.lineSnapshot.map((line) => ({ ...line })),
      total: this.total
    };
  }
}
