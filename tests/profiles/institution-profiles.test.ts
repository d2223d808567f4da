import { describe, it, expect } from 'vitest';
import { getProfile, type ProfileId } from '@cardparse/statement-parser';

function profile(id: ProfileId) {
  const found = getProfile(id);
  if (found === undefined) throw new Error(`missing profile ${id}`);
  return found;
}

describe('HDFC Bank profile', () => {
  const hdfc = profile('hdfc');

  it('should read a labelled statement', () => {
    const text = [
      'HDFC Bank Credit Card Statement',
      'Name on Card: KAVYA NAIR',
      'Card Number: XXXX XXXX XXXX 7310',
      'Statement Period: 03 Aug 2025 - 02 Sep 2025',
      'Payment Due Date: 22 Sep 2025',
      'Total Amount Due: Rs. 9,315.40',
    ].join('\n');

    expect(hdfc.extractAll(text)).toEqual({
      card_holder: 'KAVYA NAIR',
      last_4_digits: '7310',
      billing_cycle: '03 Aug 2025 - 02 Sep 2025',
      payment_due_date: '22 Sep 2025',
      total_amount_due: '₹9,315.40',
    });
  });

  it('should take the last block of an unmasked card number first', () => {
    const text = 'HDFC Bank\nCard 4147 2200 0193 8862\nCard Number: XXXX 1111';

    const match = hdfc.explain(text).last_4_digits;

    expect(match?.value).toBe('8862');
    expect(match?.ruleIndex).toBe(0);
  });

  it('should join a From/To range', () => {
    const text = 'HDFC Bank\nFrom: 01/08/2025 To: 31/08/2025';

    expect(hdfc.extractors.billing_cycle.extract(text)).toBe('01/08/2025 - 31/08/2025');
  });

  it('should prefer the new balance over other amounts', () => {
    const text = 'HDFC Bank\nMinimum Amount Due: Rs. 500.00\nNew Balance Rs. 12,000.00';

    expect(hdfc.extractors.total_amount_due.extract(text)).toBe('₹12,000.00');
  });

  it('should fall back to a salutation for the holder', () => {
    const text = 'HDFC Bank\nDear ARJUN RAO,\nThank you for banking with us';

    const match = hdfc.explain(text).card_holder;

    expect(match?.value).toBe('ARJUN RAO');
    expect(match?.rule.note).toBe('salutation');
  });
});

describe('ICICI Bank profile', () => {
  const icici = profile('icici');

  it('should read a labelled statement', () => {
    const text = [
      'ICICI Bank Credit Card Statement',
      'Card Member: PRIYA MEHTA',
      'Card Number: XXXX XXXX XXXX 1234',
      'Statement Period: 05 Sep 2025 - 04 Oct 2025',
      'Payment Due Date: 20 Oct 2025',
      'Total Amount Due: Rs. 25,500.00',
    ].join('\n');

    expect(icici.extractAll(text)).toEqual({
      card_holder: 'PRIYA MEHTA',
      last_4_digits: '1234',
      billing_cycle: '05 Sep 2025 - 04 Oct 2025',
      payment_due_date: '20 Oct 2025',
      total_amount_due: '₹25,500.00',
    });
  });

  it('should skip the minimum amount due', () => {
    const text = 'ICICI Bank\nMinimum Amount Due: INR 1,200.00\nAmount Due: INR 24,000.00';

    expect(icici.extractors.total_amount_due.extract(text)).toBe('₹24,000.00');
  });

  it('should read the last block of a labelled number that shows its first four digits', () => {
    const match = icici.extractors.last_4_digits.extractWithSource('ICICI Bank\nCard Number: 4375XXXXXXXX0917');

    expect(match?.value).toBe('0917');
    expect(match?.ruleIndex).toBe(0);
  });

  it('should skip the minimum amount due when the label is padded with a tab', () => {
    const text = 'ICICI Bank\nMinimum\tAmount Due: INR 1,200.00\nAmount Due: INR 24,000.00';

    expect(icici.extractors.total_amount_due.extract(text)).toBe('₹24,000.00');
  });

  it('should read a partly masked card number', () => {
    const text = 'ICICI Bank\n4375XXXXXXXX0917';

    expect(icici.extractors.last_4_digits.extract(text)).toBe('0917');
  });
});

describe('SBI Card profile', () => {
  const sbi = profile('sbi');

  it('should read a labelled statement', () => {
    const text = [
      'SBI Card Statement',
      'Card Holder: ANIL VERMA',
      'Card Number: XXXX XXXX XXXX 5678',
      'Billing Cycle: 10 Sep 2025 - 09 Oct 2025',
      'Due Date: 25 Oct 2025',
      'Total Amount Due: Rs. 18,200.00',
    ].join('\n');

    expect(sbi.extractAll(text)).toEqual({
      card_holder: 'ANIL VERMA',
      last_4_digits: '5678',
      billing_cycle: '10 Sep 2025 - 09 Oct 2025',
      payment_due_date: '25 Oct 2025',
      total_amount_due: '₹18,200.00',
    });
  });

  it('should read the last block of a labelled number that shows its first four digits', () => {
    expect(sbi.extractors.last_4_digits.extract('SBI Card\nCard No: 5241 XXXX XXXX 3310')).toBe('3310');
  });

  it('should skip the minimum amount due when the label has extra spaces', () => {
    const text = 'SBI Card\nMinimum  Amount Due: Rs. 910.00\nAmount Due: Rs. 18,200.00';

    expect(sbi.extractors.total_amount_due.extract(text)).toBe('₹18,200.00');
  });

  it('should read a total outstanding line', () => {
    const text = 'SBI Card\nTotal Outstanding: 6,540.25';

    expect(sbi.extractors.total_amount_due.extract(text)).toBe('₹6,540.25');
  });
});

describe('Axis Bank profile', () => {
  const axis = profile('axis');

  it('should read a labelled statement', () => {
    const text = [
      'Axis Bank Credit Card Statement',
      'Customer Name: ROHAN DESAI',
      'Card Number: XXXX XXXX XXXX 9012',
      'Statement Period: 15 Sep 2025 - 14 Oct 2025',
      'Payment Due Date: 30 Oct 2025',
      'Total Amount Due: Rs. 32,450.00',
    ].join('\n');

    expect(axis.extractAll(text)).toEqual({
      card_holder: 'ROHAN DESAI',
      last_4_digits: '9012',
      billing_cycle: '15 Sep 2025 - 14 Oct 2025',
      payment_due_date: '30 Oct 2025',
      total_amount_due: '₹32,450.00',
    });
  });

  it('should read an amount printed before its label', () => {
    const text = 'Axis Bank\n₹ 3,300.00 Total';

    const match = axis.explain(text).total_amount_due;

    expect(match?.value).toBe('₹3,300.00');
    expect(match?.ruleIndex).toBe(4);
  });
});

describe('American Express profile', () => {
  const amex = profile('amex');

  it('should read a labelled statement', () => {
    const text = [
      'American Express Statement',
      'Card Member: NEHA SHARMA',
      'Account ending: 3456',
      'Statement Period: 01 Sep 2025 - 30 Sep 2025',
      'Payment Due: 20 Oct 2025',
      'Total Amount Due: Rs. 45,000.00',
    ].join('\n');

    expect(amex.extractAll(text)).toEqual({
      card_holder: 'NEHA SHARMA',
      last_4_digits: '3456',
      billing_cycle: '01 Sep 2025 - 30 Sep 2025',
      payment_due_date: '20 Oct 2025',
      total_amount_due: '₹45,000.00',
    });
  });

  it('should read a fifteen digit masked card number', () => {
    const text = 'American Express\nXXXXXXXXXXX1007';

    expect(amex.extractors.last_4_digits.extract(text)).toBe('1007');
  });
});

describe('InstitutionProfile.validate', () => {
  it('should match keywords regardless of case', () => {
    expect(profile('hdfc').validate('welcome to www.HDFCBANK.com')).toBe(true);
    expect(profile('amex').validate('AMEX platinum')).toBe(true);
  });

  it('should reject text without any keyword', () => {
    expect(profile('sbi').validate('State Bank statement')).toBe(false);
  });
});

describe('field independence', () => {
  it('should fill other fields when one is missing', () => {
    const text = [
      'Axis Bank Credit Card Statement',
      'Customer Name: ROHAN DESAI',
      'Payment Due Date: 30 Oct 2025',
    ].join('\n');

    expect(profile('axis').extractAll(text)).toEqual({
      card_holder: 'ROHAN DESAI',
      last_4_digits: null,
      billing_cycle: null,
      payment_due_date: '30 Oct 2025',
      total_amount_due: null,
    });
  });
});
