/**
 * Payment Service
 * Validates and confirms payments against a bill
 */

import type { Bill } from '../entities/Bill.js';
import { Payment } from '../entities/Payment.js';
import { PaymentErrorCode, PaymentMethod, PaymentResult } from '../types/payment.js';
import { generatePaymentId } from '../utils/orderUtils.js';
import * as logger from '../utils/logger.js';

/**
 * Resolve user input to a payment method, ignoring case and surrounding space
 * @returns the method, or null when the input names neither cash nor card
 */
export function parsePaymentMethod(input: string): PaymentMethod | null {
  const normalized = input.trim().toUpperCase();
  const method = Object.values(PaymentMethod).find(
    (candidate) => candidate.toUpperCase() === normalized
  );
  return method ?? null;
}

export class PaymentService {
  constructor(private readonly generateId: () => string = () => generatePaymentId()) {}

  /**
   * Confirm a payment. Succeeds only for a positive amount and a cash or card method;
   * otherwise reports why without creating a payment.
   */
  processPayment(amount: number, method: string): PaymentResult {
    if (!Number.isFinite(amount) || amount <= 0) {
      logger.warn('Rejected payment with invalid amount', {
        context: 'paymentService.processPayment',
        data: { amount, method }
      });
      return {
        success: false,
        code: PaymentErrorCode.INVALID_AMOUNT,
        error: 'Invalid payment amount. Cannot process payment.'
      };
    }

    const paymentMethod = parsePaymentMethod(method);
    if (!paymentMethod) {
      logger.warn('Rejected payment with invalid method', {
        context: 'paymentService.processPayment',
        data: { amount, method }
      });
      return {
        success: false,
        code: PaymentErrorCode.INVALID_METHOD,
        error: "Invalid payment method. Please enter 'Cash' or 'Card'"
      };
    }

    const payment = new Payment(this.generateId(), paymentMethod, amount);

    logger.info('Payment processed', {
      context: 'paymentService.processPayment',
      data: { paymentId: payment.paymentId, amount, method: paymentMethod }
    });

    return { success: true, payment };
  }

  /**
   * Pay the total frozen on a bill
   */
  payBill(bill: Bill, method: string): PaymentResult {
    logger.debug('Paying bill', {
      orderId: bill.order.orderId,
      context: 'paymentService.payBill',
      data: { billId: bill.billId, total: bill.total }
    });
    return this.processPayment(bill.total, method);
  }
}
