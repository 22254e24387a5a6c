import { Staff } from '../src/entities/Staff';
import { OrderSession, PROMPTS, SessionStage } from '../src/orderSession';
import { PaymentService } from '../src/services/paymentService';
import { OrderStatus } from '../src/types/order';
import { MENU_LINES, buildCatalog, formatOptions } from './support/fixtures';

jest.mock('../src/utils/logger');

function createSession(): OrderSession {
  return new OrderSession({
    catalog: buildCatalog(),
    staff: new Staff(1, 'Duty Manager'),
    format: formatOptions,
    paymentService: new PaymentService(() => 'PAY-TEST-1'),
    orderId: 2,
    billId: 1,
    now: () => new Date(2026, 0, 5)
  });
}

describe('OrderSession', () => {
  let session: OrderSession;

  beforeEach(() => {
    session = createSession();
  });

  test('asks for the customer name first', () => {
    expect(session.start()).toEqual({ messages: [], prompt: PROMPTS.NAME, done: false });
    expect(session.stage).toBe(SessionStage.NAME_ENTRY);
  });

  test('insists on a name', () => {
    session.start();

    expect(session.handleInput('   ')).toEqual({
      messages: ['Please enter your name.'],
      prompt: PROMPTS.NAME,
      done: false
    });
  });

  test('takes an order through to payment', () => {
    session.start();

    expect(session.handleInput('Sam')).toEqual({ messages: MENU_LINES, prompt: PROMPTS.ITEM, done: false });
    expect(session.handleInput('1')).toEqual({ messages: [], prompt: PROMPTS.QUANTITY, done: false });
    expect(session.handleInput('2').messages).toEqual([
      '[Notification] Item added to order',
      'Your order:',
      '1. Chuna Sandwich x2 - £7.00',
      'Order Total (including VAT): £8.40'
    ]);
    expect(session.handleInput('n')).toEqual({ messages: MENU_LINES, prompt: PROMPTS.ITEM, done: false });
    expect(session.handleInput('q')).toEqual({
      messages: ['Your order:', '1. Chuna Sandwich x2 - £7.00', 'Order Total (including VAT): £8.40'],
      prompt: PROMPTS.CONFIRM,
      done: false
    });

    expect(session.handleInput('Y')).toEqual({
      messages: [
        'Order 2 placed by Sam',
        'Order completed successfully!',
        "[Notification] Order status updated to 'Completed'",
        '===== Cafe Bill =====',
        'Bill ID: 1',
        'Order ID: 2',
        'Date: 05/01/2026',
        '---------------------',
        'Chuna Sandwich x2 - £7.00',
        '---------------------',
        'Total (including VAT): £8.40',
        '====================='
      ],
      prompt: PROMPTS.PAYMENT_METHOD,
      done: false
    });
    expect(session.order.status).toBe(OrderStatus.COMPLETED);
    expect(session.bill?.total).toBe(8.4);

    expect(session.handleInput('cheque')).toEqual({
      messages: ["Invalid payment method. Please enter 'Cash' or 'Card'"],
      prompt: PROMPTS.PAYMENT_METHOD,
      done: false
    });
    expect(session.handleInput('cash')).toEqual({
      messages: ['Payment of £8.40 received via Cash'],
      prompt: '',
      done: true
    });
    expect(session.payment?.paymentId).toBe('PAY-TEST-1');
    expect(session.handleInput('anything')).toEqual({ messages: [], prompt: '', done: true });
  });

  test('removes units and whole lines', () => {
    session.start();
    session.handleInput('Sam');
    session.handleInput('2');

    expect(session.handleInput('3').messages).toEqual([
      '[Notification] Item added to order',
      'Your order:',
      '1. Latte (Medium) x3 - £8.40',
      'Order Total (including VAT): £10.08'
    ]);
    expect(session.handleInput('y').prompt).toBe(PROMPTS.REMOVE_POSITION);
    expect(session.handleInput('1').prompt).toBe('Quantity to remove (max 3): ');
    expect(session.handleInput('1')).toEqual({
      messages: [
        '[Notification] the item quantity has been updated',
        'Your order:',
        '1. Latte (Medium) x2 - £5.60',
        'Order Total (including VAT): £6.72'
      ],
      prompt: PROMPTS.REMOVE,
      done: false
    });

    session.handleInput('y');
    session.handleInput('1');
    expect(session.handleInput('5')).toEqual({
      messages: ['[Notification] Item has been removed from your order', 'Order is currently empty.'],
      prompt: PROMPTS.REMOVE,
      done: false
    });
    expect(session.order.lineCount).toBe(0);
  });

  test('refuses to confirm an empty order', () => {
    session.start();
    session.handleInput('Sam');

    expect(session.handleInput('Q')).toEqual({
      messages: ['Order is currently empty.'],
      prompt: PROMPTS.CONFIRM,
      done: false
    });
    expect(session.handleInput('y')).toEqual({
      messages: ['Cannot place an empty order. Add items first.', ...MENU_LINES],
      prompt: PROMPTS.ITEM,
      done: false
    });
    expect(session.order.status).toBe(OrderStatus.PENDING);
    expect(session.bill).toBeNull();
  });

  test('re-prompts after bad item and quantity input', () => {
    session.start();
    session.handleInput('Sam');

    expect(session.handleInput('abc').messages)
      .toEqual(['Invalid input. Please enter valid numbers.', ...MENU_LINES]);
    expect(session.handleInput('99').messages)
      .toEqual(['Invalid menu item number.', ...MENU_LINES]);

    session.handleInput('1');
    expect(session.handleInput('0')).toEqual({
      messages: ['Invalid input. Please enter valid numbers.', ...MENU_LINES],
      prompt: PROMPTS.ITEM,
      done: false
    });
    expect(session.order.isEmpty()).toBe(true);
  });

  test('re-prompts after a bad removal selection', () => {
    const orderLines = ['Your order:', '1. Chuna Sandwich x1 - £3.50', 'Order Total (including VAT): £4.20'];
    session.start();
    session.handleInput('Sam');
    session.handleInput('1');
    session.handleInput('1');

    session.handleInput('y');
    expect(session.handleInput('4')).toEqual({
      messages: ['Invalid removal selection.', ...orderLines],
      prompt: PROMPTS.REMOVE,
      done: false
    });

    session.handleInput('y');
    session.handleInput('1');
    expect(session.handleInput('-1').messages).toEqual(['Invalid removal selection.', ...orderLines]);
    expect(session.order.lines[0].quantity).toBe(1);
  });

  test('going back from confirmation shows the menu again', () => {
    session.start();
    session.handleInput('Sam');
    session.handleInput('q');

    expect(session.handleInput('n')).toEqual({ messages: MENU_LINES, prompt: PROMPTS.ITEM, done: false });
  });
});
