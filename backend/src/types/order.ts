/**
 * Order status values. COMPLETED and CANCELLED are terminal.
 */
export enum OrderStatus {
  PENDING = 'Pending',
  COMPLETED = 'Completed',
  CANCELLED = 'Cancelled'
}

/**
 * Anything that wants to hear about changes to an order
 */
export interface OrderObserver {
  update(message: string): void;
}

export enum RemoveLineOutcome {
  REMOVED = 'removed',
  DECREMENTED = 'decremented',
  OUT_OF_RANGE = 'out_of_range'
}

/**
 * Presentation view of one order line
 */
export interface OrderLineSummary {
  position: number;
  name: string;
  size?: string;
  quantity: number;
  subtotal: number;
}

export const ORDER_MESSAGES = {
  ITEM_ADDED: 'Item added to order',
  ITEM_REMOVED: 'Item has been removed from your order',
  QUANTITY_UPDATED: 'the item quantity has been updated'
} as const;

export function isTerminalStatus(status: OrderStatus): boolean {
  return status === OrderStatus.COMPLETED || status === OrderStatus.CANCELLED;
}
