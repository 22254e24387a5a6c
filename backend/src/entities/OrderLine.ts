import { MenuItem } from '../types/menu.js';

export class OrderCalculationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OrderCalculationError';
  }
}

/**
 * One catalog item and how many of it were ordered. Immutable:
 * the owning order replaces a line to change its quantity.
 */
export class OrderLine {
  constructor(
    public readonly lineId: number,
    public readonly item: MenuItem,
    public readonly quantity: number
  ) {}

  /**
   * Price times quantity, untaxed
   * @throws {OrderCalculationError} if the item price or quantity is unusable
   */
  subtotal(): number {
    const { price, name } = this.item;
    if (!Number.isFinite(price) || price < 0) {
      throw new OrderCalculationError(`Item '${name}' has an invalid price: ${price}`);
    }
    if (!Number.isFinite(this.quantity)) {
      throw new OrderCalculationError(`Line ${this.lineId} has an invalid quantity: ${this.quantity}`);
    }
    return price * this.quantity;
  }
}
