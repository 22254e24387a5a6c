import type { Payment } from '../entities/Payment.js';

export enum PaymentMethod {
  CASH = 'Cash',
  CARD = 'Card'
}

export enum PaymentErrorCode {
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  INVALID_METHOD = 'INVALID_METHOD'
}

export type PaymentResult =
  | { success: true; payment: Payment }
  | { success: false; code: PaymentErrorCode; error: string };
