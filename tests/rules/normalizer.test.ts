import { describe, it, expect } from 'vitest';
import { normalizeValue, FIELD_KINDS } from '@cardparse/statement-parser';

describe('normalizeValue', () => {
  it('should prefix amounts with the rupee symbol and keep grouping', () => {
    expect(normalizeValue('total_amount_due', ' 1,02,345.50 ')).toBe('₹1,02,345.50');
  });

  it('should not round or reformat amounts', () => {
    expect(normalizeValue('total_amount_due', '14820')).toBe('₹14820');
    expect(normalizeValue('total_amount_due', '14,820.5')).toBe('₹14,820.5');
  });

  it('should trim dates without changing them', () => {
    expect(normalizeValue('payment_due_date', '  15 Oct 2025\t')).toBe('15 Oct 2025');
    expect(normalizeValue('billing_cycle', '01 Sep 2025 to 30 Sep 2025')).toBe('01 Sep 2025 to 30 Sep 2025');
  });

  it('should join a range capture with a spaced hyphen', () => {
    expect(normalizeValue('billing_cycle', [' 01/09/2025', '30/09/2025 '])).toBe('01/09/2025 - 30/09/2025');
  });

  it('should keep case and inner spacing of names', () => {
    expect(normalizeValue('card_holder', ' Meera  Iyer\n')).toBe('Meera  Iyer');
  });

  it('should trim card digits', () => {
    expect(normalizeValue('last_4_digits', ' 0042 ')).toBe('0042');
  });
});

describe('FIELD_KINDS', () => {
  it('should classify every field', () => {
    expect(FIELD_KINDS).toEqual({
      card_holder: 'token',
      last_4_digits: 'token',
      billing_cycle: 'date',
      payment_due_date: 'date',
      total_amount_due: 'amount',
    });
  });
});
