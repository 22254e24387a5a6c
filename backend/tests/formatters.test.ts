import { Bill } from '../src/entities/Bill';
import { Order } from '../src/entities/Order';
import { formatBill, formatMenu, formatOrder } from '../src/utils/formatters';
import { MENU_LINES, formatOptions, latte, sandwich } from './support/fixtures';

jest.mock('../src/utils/logger');

describe('formatMenu', () => {
  test('lists food and drinks with prices', () => {
    expect(formatMenu([sandwich, latte], formatOptions)).toEqual(MENU_LINES);
  });

  test('reports an empty menu', () => {
    expect(formatMenu([], formatOptions)).toEqual(['Menu is empty.']);
  });

  test('uses the configured cafe name and currency', () => {
    expect(formatMenu([sandwich], { cafeName: 'Corner', currencySymbol: '$' })).toEqual([
      '===== Corner Menu =====',
      '1. Chuna Sandwich ($3.50) - Food',
      '======================='
    ]);
  });
});

describe('formatOrder', () => {
  test('reports an empty order', () => {
    expect(formatOrder(new Order(1), formatOptions)).toEqual(['Order is currently empty.']);
  });

  test('numbers the lines and shows the taxed total', () => {
    const order = new Order(1);
    order.addLine(latte, 2);
    order.addLine(sandwich, 1);

    expect(formatOrder(order, formatOptions)).toEqual([
      'Your order:',
      '1. Latte (Medium) x2 - £5.60',
      '2. Chuna Sandwich x1 - £3.50',
      'Order Total (including VAT): £10.92'
    ]);
  });
});

describe('formatBill', () => {
  test('prints the bill with the order date', () => {
    const order = new Order(3, new Date(2026, 0, 5));
    order.addLine(sandwich, 2);
    const bill = new Bill(1, order, new Date(2026, 0, 5, 13, 0));

    expect(formatBill(bill.render(), formatOptions)).toEqual([
      '===== Cafe Bill =====',
      'Bill ID: 1',
      'Order ID: 3',
      'Date: 05/01/2026',
      '---------------------',
      'Chuna Sandwich x2 - £7.00',
      '---------------------',
      'Total (including VAT): £8.40',
      '====================='
    ]);
  });
});
