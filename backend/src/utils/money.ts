/**
 * Round a monetary amount to two decimal places
 */
export function roundMoney(amount: number): number {
  return parseFloat(amount.toFixed(2));
}

/**
 * Format an amount for display, e.g. formatMoney(3.5, '£') === '£3.50'
 */
export function formatMoney(amount: number, currencySymbol: string): string {
  return `${currencySymbol}${amount.toFixed(2)}`;
}
