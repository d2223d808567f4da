import { CURRENCY_SYMBOL, RANGE_SEPARATOR, type FieldName } from '@cardparse/types';
import type { RawCapture } from './pattern-rule.js';

export type FieldKind = 'amount' | 'date' | 'token';

export const FIELD_KINDS: Readonly<Record<FieldName, FieldKind>> = Object.freeze({
  card_holder: 'token',
  last_4_digits: 'token',
  billing_cycle: 'date',
  payment_due_date: 'date',
  total_amount_due: 'amount',
});

/**
 * Canonical string for a capture. Values are only trimmed: amounts keep their digit
 * grouping and decimals, dates keep their month names and delimiters.
 */
export function normalizeValue(field: FieldName, capture: RawCapture): string {
  const value =
    typeof capture === 'string'
      ? capture.trim()
      : `${capture[0].trim()}${RANGE_SEPARATOR}${capture[1].trim()}`;

  switch (FIELD_KINDS[field]) {
    case 'amount':
      return `${CURRENCY_SYMBOL}${value}`;
    case 'date':
    case 'token':
      return value;
  }
}
