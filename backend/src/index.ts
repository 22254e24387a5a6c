export { loadConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';
export { Bill } from './entities/Bill.js';
export type { BillSummary } from './entities/Bill.js';
export { Customer } from './entities/Customer.js';
export type { PlaceOrderResult } from './entities/Customer.js';
export { Order } from './entities/Order.js';
export { OrderLine, OrderCalculationError } from './entities/OrderLine.js';
export { Payment } from './entities/Payment.js';
export { Staff } from './entities/Staff.js';
export { OrderSession, SessionStage, PROMPTS, SESSION_ERRORS } from './orderSession.js';
export type { OrderSessionOptions, SessionReply } from './orderSession.js';
export { MenuCatalog, MenuDataError, createMenuCatalog, loadMenuCatalog } from './services/menuCatalog.js';
export { createMenuItem } from './services/menuItemFactory.js';
export { NotificationChannel } from './services/notificationChannel.js';
export { PaymentService, parsePaymentMethod } from './services/paymentService.js';
export { PriceCalculator, priceCalculator } from './services/priceCalculator.js';
export type { PriceBreakdown } from './services/priceCalculator.js';
export * from './types/menu.js';
export * from './types/order.js';
export * from './types/payment.js';
export { formatBill, formatMenu, formatOrder } from './utils/formatters.js';
export type { FormatOptions } from './utils/formatters.js';
export { formatMoney, roundMoney } from './utils/money.js';
export { default as logger, LogLevel } from './utils/logger.js';
