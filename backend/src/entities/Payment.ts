import { PaymentMethod } from '../types/payment.js';

/**
 * A confirmed payment. Only PaymentService creates these, after validation.
 */
export class Payment {
  constructor(
    public readonly paymentId: string,
    public readonly method: PaymentMethod,
    public readonly amount: number,
    public readonly processedAt: Date = new Date()
  ) {}
}
