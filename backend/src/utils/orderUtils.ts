/**
 * Generates a payment ID for a confirmed payment
 * Format: PAY-YYYYMMDD-XXXX where XXXX is a random 4-digit number
 */
export function generatePaymentId(date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const random = Math.floor(Math.random() * 10000).toString().padStart(4, '0');

  return `PAY-${year}${month}${day}-${random}`;
}

/**
 * Returns a generator of sequential integer IDs, starting at `start`
 */
export function createIdSequence(start = 1): () => number {
  let next = start;
  return () => next++;
}

/**
 * Formats a date as DD/MM/YYYY for receipts
 */
export function formatOrderDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${day}/${month}/${date.getFullYear()}`;
}
