import { OrderObserver } from '../types/order.js';
import * as logger from '../utils/logger.js';

/**
 * Ordered set of observers that receive textual status events.
 * Delivery is synchronous, once per observer, in subscription order.
 */
export class NotificationChannel {
  private readonly observers: OrderObserver[] = [];

  constructor(private readonly context = 'notificationChannel') {}

  subscribe(observer: OrderObserver): void {
    if (this.observers.includes(observer)) return;
    this.observers.push(observer);
  }

  notify(message: string): void {
    for (const observer of [...this.observers]) {
      try {
        observer.update(message);
      } catch (error) {
        // keep delivering to the remaining observers
        logger.error('Observer failed to handle notification', {
          context: this.context,
          data: { message },
          error
        });
      }
    }
  }
}
