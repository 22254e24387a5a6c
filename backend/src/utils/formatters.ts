// Plain-text rendering of the menu, the current order and the bill

import type { BillSummary } from '../entities/Bill.js';
import type { Order } from '../entities/Order.js';
import { MenuItem, isDrink } from '../types/menu.js';
import { OrderLineSummary } from '../types/order.js';
import { formatMoney } from './money.js';
import { formatOrderDate } from './orderUtils.js';

export interface FormatOptions {
  cafeName: string;
  currencySymbol: string;
}

function formatLine(line: OrderLineSummary, currencySymbol: string): string {
  const size = line.size ? ` (${line.size})` : '';
  return `${line.name}${size} x${line.quantity} - ${formatMoney(line.subtotal, currencySymbol)}`;
}

export function formatMenu(items: readonly MenuItem[], options: FormatOptions): string[] {
  if (items.length === 0) {
    return ['Menu is empty.'];
  }

  const header = `===== ${options.cafeName} Menu =====`;
  const lines = items.map((item) => {
    const price = formatMoney(item.price, options.currencySymbol);
    return isDrink(item)
      ? `${item.id}. ${item.name} (${price}) - Drink [${item.size}]`
      : `${item.id}. ${item.name} (${price}) - Food`;
  });

  return [header, ...lines, '='.repeat(header.length)];
}

export function formatOrder(order: Order, options: FormatOptions): string[] {
  if (order.isEmpty()) {
    return ['Order is currently empty.'];
  }

  return [
    'Your order:',
    ...order.describeLines().map(
      (line) => `${line.position}. ${formatLine(line, options.currencySymbol)}`
    ),
    `Order Total (including VAT): ${formatMoney(order.total(), options.currencySymbol)}`
  ];
}

export function formatBill(bill: BillSummary, options: FormatOptions): string[] {
  const header = `===== ${options.cafeName} Bill =====`;
  const rule = '-'.repeat(header.length);

  return [
    header,
    `Bill ID: ${bill.billId}`,
    `Order ID: ${bill.orderId}`,
    `Date: ${formatOrderDate(bill.orderDate)}`,
    rule,
    ...bill.lines.map((line) => formatLine(line, options.currencySymbol)),
    rule,
    `Total (including VAT): ${formatMoney(bill.total, options.currencySymbol)}`,
    '='.repeat(header.length)
  ];
}
