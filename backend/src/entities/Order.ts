import { OrderLine } from './OrderLine.js';
import { NotificationChannel } from '../services/notificationChannel.js';
import { priceCalculator } from '../services/priceCalculator.js';
import { MenuItem, isDrink } from '../types/menu.js';
import {
  ORDER_MESSAGES,
  OrderLineSummary,
  OrderObserver,
  OrderStatus,
  RemoveLineOutcome,
  isTerminalStatus
} from '../types/order.js';
import { createIdSequence } from '../utils/orderUtils.js';
import { roundMoney } from '../utils/money.js';
import * as logger from '../utils/logger.js';

/**
 * A customer's order: an ordered list of lines plus a status.
 * Every mutation is announced to the subscribed observers.
 */
export class Order {
  private readonly orderLines: OrderLine[] = [];
  private readonly notifications: NotificationChannel;
  private readonly nextLineId = createIdSequence();
  private currentStatus: OrderStatus;

  constructor(
    public readonly orderId: number,
    public readonly orderDate: Date = new Date(),
    status: OrderStatus = OrderStatus.PENDING
  ) {
    this.currentStatus = status;
    this.notifications = new NotificationChannel(`Order ${orderId}`);
  }

  get status(): OrderStatus {
    return this.currentStatus;
  }

  get lines(): readonly OrderLine[] {
    return [...this.orderLines];
  }

  get lineCount(): number {
    return this.orderLines.length;
  }

  isEmpty(): boolean {
    return this.orderLines.length === 0;
  }

  subscribe(observer: OrderObserver): void {
    this.notifications.subscribe(observer);
  }

  notify(message: string): void {
    this.notifications.notify(message);
  }

  /**
   * Append a line for `quantity` units of `item`.
   * The quantity is not validated here; callers check it is a positive integer.
   */
  addLine(item: MenuItem, quantity: number): OrderLine {
    const line = new OrderLine(this.nextLineId(), item, quantity);
    this.orderLines.push(line);

    logger.debug('Line added to order', {
      orderId: this.orderId,
      context: 'Order.addLine',
      data: { lineId: line.lineId, itemId: item.id, quantity }
    });

    this.notify(ORDER_MESSAGES.ITEM_ADDED);
    return line;
  }

  /**
   * Remove `quantity` units from the line at 1-based `position`.
   * The whole line goes once the quantity would reach zero.
   * An out-of-range position changes nothing and notifies nobody.
   */
  removeLine(position: number, quantity: number): RemoveLineOutcome {
    const index = position - 1;
    if (!Number.isInteger(index) || index < 0 || index >= this.orderLines.length) {
      logger.debug('Ignoring removal outside the order', {
        orderId: this.orderId,
        context: 'Order.removeLine',
        data: { position, lineCount: this.orderLines.length }
      });
      return RemoveLineOutcome.OUT_OF_RANGE;
    }

    const line = this.orderLines[index];
    if (quantity >= line.quantity) {
      this.orderLines.splice(index, 1);
      this.notify(ORDER_MESSAGES.ITEM_REMOVED);
      return RemoveLineOutcome.REMOVED;
    }

    this.orderLines[index] = new OrderLine(line.lineId, line.item, line.quantity - quantity);
    this.notify(ORDER_MESSAGES.QUANTITY_UPDATED);
    return RemoveLineOutcome.DECREMENTED;
  }

  /**
   * Sum of line subtotals, before tax
   * @throws {OrderCalculationError} when a line cannot be priced
   */
  subtotal(): number {
    return this.orderLines.reduce((sum, line) => sum + line.subtotal(), 0);
  }

  /**
   * Subtotal plus 20% VAT, rounded to pence. Returns 0 for an empty order.
   * Never throws: a line that cannot be priced is logged and the total falls back to 0.
   */
  total(): number {
    try {
      return priceCalculator.calculateOrderPrices(this.subtotal()).total;
    } catch (error) {
      logger.error('Failed to calculate order total, falling back to zero', {
        orderId: this.orderId,
        context: 'Order.total',
        error
      });
      return 0;
    }
  }

  /**
   * Presentation view of the lines, in order. A line that cannot be priced shows a zero subtotal.
   */
  describeLines(): OrderLineSummary[] {
    return this.orderLines.map((line, index) => {
      let subtotal = 0;
      try {
        subtotal = roundMoney(line.subtotal());
      } catch (error) {
        logger.warn('Could not price order line', {
          orderId: this.orderId,
          context: 'Order.describeLines',
          data: { lineId: line.lineId },
          error
        });
      }

      const summary: OrderLineSummary = {
        position: index + 1,
        name: line.item.name,
        quantity: line.quantity,
        subtotal
      };
      if (isDrink(line.item)) {
        summary.size = line.item.size;
      }
      return summary;
    });
  }

  updateStatus(status: OrderStatus): void {
    this.currentStatus = status;

    if (isTerminalStatus(status)) {
      logger.info('Order finalized', {
        orderId: this.orderId,
        context: 'Order.updateStatus',
        data: { status }
      });
    }

    this.notify(`Order status updated to '${status}'`);
  }
}
