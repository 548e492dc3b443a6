import { formatInTimeZone } from 'date-fns-tz';
import { v4 as uuidv4 } from 'uuid';

/**
 * Format Philippine Peso currency
 */
export function formatCurrency(amount: number): string {
  return `₱${amount.toLocaleString('en-PH', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

/**
 * Calendar date in the shop's time zone, e.g. "March 5, 2026".
 */
export function formatShopDate(date: Date, timeZone: string, pattern = 'MMMM d, yyyy'): string {
  return formatInTimeZone(date, timeZone, pattern);
}

/**
 * Round a peso amount to centavos.
 */
export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/**
 * Document number: PREFIX-XXXXXXXX (first 8 hex digits of a v4 uuid, upper-cased).
 * Used for orders (ORD), payments (PAY) and commissions (COM).
 */
export function generateDocumentNumber(prefix: 'ORD' | 'PAY' | 'COM', id: string = uuidv4()): string {
  return `${prefix}-${id.replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

/**
 * Normalize a Philippine mobile number for the SMS gateway.
 * "0917 123-4567" → "639171234567"; numbers already in 63/+63 form are kept.
 */
export function normalizePhone(phone: string): string {
  const cleaned = phone.replace(/[\s-]/g, '');
  if (!cleaned.startsWith('+63') && !cleaned.startsWith('63') && cleaned.startsWith('0')) {
    return `63${cleaned.slice(1)}`;
  }
  return cleaned;
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function paginate(page: number, limit: number) {
  return { skip: (page - 1) * limit, limit };
}

export function paginationMeta(page: number, limit: number, total: number) {
  return { page, limit, total, totalPages: Math.ceil(total / limit) };
}
