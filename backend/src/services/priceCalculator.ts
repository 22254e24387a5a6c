/**
 * Price Calculator Service
 * Handles the tax applied to an order's summed subtotal
 */

import { roundMoney } from '../utils/money.js';

export interface PriceBreakdown {
  subtotal: number;
  tax: number;
  total: number;
}

export class PriceCalculator {
  private static instance: PriceCalculator;
  public static readonly TAX_RATE = 0.20; // 20% VAT

  private constructor() {}

  public static getInstance(): PriceCalculator {
    if (!PriceCalculator.instance) {
      PriceCalculator.instance = new PriceCalculator();
    }
    return PriceCalculator.instance;
  }

  /**
   * Calculate prices for an order. Tax is applied once, to the whole subtotal.
   * @param subtotal The sum of all line subtotals
   */
  calculateOrderPrices(subtotal: number): PriceBreakdown {
    const total = roundMoney(subtotal * (1 + PriceCalculator.TAX_RATE));

    return {
      subtotal: roundMoney(subtotal),
      tax: roundMoney(total - subtotal),
      total
    };
  }
}

// Export the singleton instance
export const priceCalculator = PriceCalculator.getInstance();
