// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

import { Bill } from './entities/Bill.js';
import { Customer } from './entities/Customer.js';
import { Order } from './entities/Order.js';
import type { Payment } from './entities/Payment.js';
import type { Staff } from './entities/Staff.js';
import type { MenuCatalog } from './services/menuCatalog.js';
import { PaymentService } from './services/paymentService.js';
import { MenuItem } from './types/menu.js';
import { OrderStatus } from './types/order.js';
import { PaymentErrorCode } from './types/payment.js';
import { FormatOptions, formatBill, formatMenu, formatOrder } from './utils/formatters.js';
import { formatMoney } from './utils/money.js';
import * as logger from './utils/logger.js';

/**
 * Enum for session stages
 */
export enum SessionStage {
  NAME_ENTRY = 'name_entry',

  // Building the order
  ITEM_SELECTION = 'item_selection',
  QUANTITY_ENTRY = 'quantity_entry',
  REMOVAL_PROMPT = 'removal_prompt',
  REMOVAL_POSITION = 'removal_position',
  REMOVAL_QUANTITY = 'removal_quantity',
  ORDER_CONFIRMATION = 'order_confirmation',

  // Paying
  PAYMENT_METHOD = 'payment_method',
  COMPLETE = 'complete'
}

export const PROMPTS = {
  NAME: 'Enter your name: ',
  ITEM: 'Enter the number of the item you want to order (or press Q to finish): ',
  QUANTITY: 'Enter quantity of this item: ',
  REMOVE: 'Remove an item? (Y/N): ',
  REMOVE_POSITION: 'Enter the item number to remove from your current order: ',
  CONFIRM: 'Confirm your order? (Y/N): ',
  PAYMENT_METHOD: 'Enter payment method (Cash/Card): '
} as const;

export const SESSION_ERRORS = {
  EMPTY_NAME: 'Please enter your name.',
  INVALID_NUMBER: 'Invalid input. Please enter valid numbers.',
  UNKNOWN_ITEM: 'Invalid menu item number.',
  INVALID_REMOVAL: 'Invalid removal selection.'
} as const;

/**
 * What the session has to say after each input
 */
export interface SessionReply {
  messages: string[];
  prompt: string;
  done: boolean;
}

export interface OrderSessionOptions {
  catalog: MenuCatalog;
  staff: Staff;
  format: FormatOptions;
  paymentService?: PaymentService;
  orderId?: number;
  billId?: number;
  customerId?: number;
  now?: () => Date;
}

function parseInteger(input: string): number | null {
  const text = input.trim();
  return /^[+-]?\d+$/.test(text) ? Number(text) : null;
}

function isYes(input: string): boolean {
  return input.trim().toUpperCase() === 'Y';
}

/**
 * One customer's ordering session, driven one input line at a time.
 * Performs no I/O: callers print the messages and ask for the prompt.
 */
export class OrderSession {
  private currentStage: SessionStage = SessionStage.NAME_ENTRY;
  private outbox: string[] = [];
  private customer: Customer;
  private pendingItem: MenuItem | null = null;
  private pendingPosition: number | null = null;
  private issuedBill: Bill | null = null;
  private confirmedPayment: Payment | null = null;

  private readonly catalog: MenuCatalog;
  private readonly staff: Staff;
  private readonly format: FormatOptions;
  private readonly paymentService: PaymentService;
  private readonly billId: number;
  private readonly now: () => Date;
  private readonly correlationId = logger.createCorrelationId();
  public readonly order: Order;

  constructor(options: OrderSessionOptions) {
    this.catalog = options.catalog;
    this.staff = options.staff;
    this.format = options.format;
    this.paymentService = options.paymentService ?? new PaymentService();
    this.billId = options.billId ?? 1;
    this.now = options.now ?? (() => new Date());
    this.customer = new Customer(options.customerId ?? 1, '');
    this.order = new Order(options.orderId ?? 1, this.now());
    this.order.subscribe({
      update: (message) => this.outbox.push(`[Notification] ${message}`)
    });
  }

  get stage(): SessionStage {
    return this.currentStage;
  }

  get bill(): Bill | null {
    return this.issuedBill;
  }

  get payment(): Payment | null {
    return this.confirmedPayment;
  }

  start(): SessionReply {
    return this.reply(PROMPTS.NAME);
  }

  handleInput(input: string): SessionReply {
    logger.debug('Session input', {
      correlationId: this.correlationId,
      orderId: this.order.orderId,
      context: 'orderSession',
      data: { stage: this.currentStage, input }
    });

    switch (this.currentStage) {
      case SessionStage.NAME_ENTRY:
        return this.reply(this.enterName(input));
      case SessionStage.ITEM_SELECTION:
        return this.reply(this.selectItem(input));
      case SessionStage.QUANTITY_ENTRY:
        return this.reply(this.enterQuantity(input));
      case SessionStage.REMOVAL_PROMPT:
        return this.reply(
          isYes(input)
            ? this.moveTo(SessionStage.REMOVAL_POSITION, PROMPTS.REMOVE_POSITION)
            : this.showMenu()
        );
      case SessionStage.REMOVAL_POSITION:
        return this.reply(this.selectRemovalPosition(input));
      case SessionStage.REMOVAL_QUANTITY:
        return this.reply(this.enterRemovalQuantity(input));
      case SessionStage.ORDER_CONFIRMATION:
        return this.reply(isYes(input) ? this.confirmOrder() : this.showMenu());
      case SessionStage.PAYMENT_METHOD:
        return this.reply(this.pay(input));
      case SessionStage.COMPLETE:
        return this.reply('');
    }
  }

  private reply(prompt: string): SessionReply {
    const messages = this.outbox;
    this.outbox = [];
    return { messages, prompt, done: this.currentStage === SessionStage.COMPLETE };
  }

  private say(...lines: string[]): void {
    this.outbox.push(...lines);
  }

  private moveTo(stage: SessionStage, prompt: string): string {
    this.currentStage = stage;
    return prompt;
  }

  private showMenu(): string {
    this.say(...formatMenu(this.catalog.list(), this.format));
    return this.moveTo(SessionStage.ITEM_SELECTION, PROMPTS.ITEM);
  }

  private showOrderForRemoval(): string {
    this.say(...formatOrder(this.order, this.format));
    return this.moveTo(SessionStage.REMOVAL_PROMPT, PROMPTS.REMOVE);
  }

  private enterName(input: string): string {
    const name = input.trim();
    if (!name) {
      this.say(SESSION_ERRORS.EMPTY_NAME);
      return PROMPTS.NAME;
    }
    this.customer = new Customer(this.customer.customerId, name);
    return this.showMenu();
  }

  private selectItem(input: string): string {
    if (input.trim().toUpperCase() === 'Q') {
      this.say(...formatOrder(this.order, this.format));
      return this.moveTo(SessionStage.ORDER_CONFIRMATION, PROMPTS.CONFIRM);
    }

    const itemId = parseInteger(input);
    if (itemId === null) {
      this.say(SESSION_ERRORS.INVALID_NUMBER);
      return this.showMenu();
    }

    const item = this.catalog.find(itemId);
    if (!item) {
      this.say(SESSION_ERRORS.UNKNOWN_ITEM);
      return this.showMenu();
    }

    this.pendingItem = item;
    return this.moveTo(SessionStage.QUANTITY_ENTRY, PROMPTS.QUANTITY);
  }

  private enterQuantity(input: string): string {
    const quantity = parseInteger(input);
    const item = this.pendingItem;
    this.pendingItem = null;

    if (!item || quantity === null || quantity <= 0) {
      this.say(SESSION_ERRORS.INVALID_NUMBER);
      return this.showMenu();
    }

    this.order.addLine(item, quantity);
    return this.showOrderForRemoval();
  }

  private selectRemovalPosition(input: string): string {
    const position = parseInteger(input);
    const line = position !== null ? this.order.lines[position - 1] : undefined;

    if (position === null || position < 1 || !line) {
      this.say(SESSION_ERRORS.INVALID_REMOVAL);
      return this.showOrderForRemoval();
    }

    this.pendingPosition = position;
    return this.moveTo(SessionStage.REMOVAL_QUANTITY, `Quantity to remove (max ${line.quantity}): `);
  }

  private enterRemovalQuantity(input: string): string {
    const quantity = parseInteger(input);
    const position = this.pendingPosition;
    this.pendingPosition = null;

    if (position === null || quantity === null || quantity <= 0) {
      this.say(SESSION_ERRORS.INVALID_REMOVAL);
      return this.showOrderForRemoval();
    }

    this.order.removeLine(position, quantity);
    return this.showOrderForRemoval();
  }

  private confirmOrder(): string {
    const placed = this.customer.placeOrder(this.order);
    if (!placed.success) {
      this.say(placed.error);
      return this.showMenu();
    }

    this.say(placed.message, 'Order completed successfully!');
    this.staff.updateOrderStatus(this.order, OrderStatus.COMPLETED);

    const bill = new Bill(this.billId, this.order, this.now());
    this.issuedBill = bill;
    this.say(...formatBill(bill.render(), this.format));

    return this.moveTo(SessionStage.PAYMENT_METHOD, PROMPTS.PAYMENT_METHOD);
  }

  private pay(input: string): string {
    const bill = this.issuedBill;
    if (!bill) {
      return this.showMenu();
    }

    const result = this.paymentService.payBill(bill, input);
    if (result.success) {
      const { amount, method } = result.payment;
      this.confirmedPayment = result.payment;
      logger.info('Order session complete', {
        correlationId: this.correlationId,
        orderId: this.order.orderId,
        context: 'orderSession',
        data: { paymentId: result.payment.paymentId }
      });
      this.say(`Payment of ${formatMoney(amount, this.format.currencySymbol)} received via ${method}`);
      return this.moveTo(SessionStage.COMPLETE, '');
    }

    this.say(result.error);
    if (result.code === PaymentErrorCode.INVALID_METHOD) {
      return PROMPTS.PAYMENT_METHOD;
    }
    return this.moveTo(SessionStage.COMPLETE, '');
  }
}
