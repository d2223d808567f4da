import { describe, it, expect, vi } from 'vitest';
import { FieldExtractor, PatternRule } from '@cardparse/statement-parser';

describe('FieldExtractor', () => {
  const text = [
    'Dear RAVI KUMAR,',
    'Card Holder: R KUMAR',
    'Total Due: Rs. 7,410.00',
    'Amount Due: Rs. 7,000.00',
  ].join('\n');

  it('should return the first rule match even when later rules also match', () => {
    const extractor = new FieldExtractor('total_amount_due', [
      new PatternRule('Total Due:\\s*Rs\\.\\s*([\\d,.]+)'),
      new PatternRule('Amount Due:\\s*Rs\\.\\s*([\\d,.]+)'),
    ]);

    expect(extractor.extract(text)).toBe('₹7,410.00');
  });

  it('should not evaluate rules after the winning one', () => {
    const first = new PatternRule('Card Holder:\\s*([A-Z ]+)');
    const second = new PatternRule('Dear ([A-Z ]+),');
    const spy = vi.spyOn(second, 'match');

    const extractor = new FieldExtractor('card_holder', [first, second]);

    expect(extractor.extract(text)).toBe('R KUMAR');
    expect(spy).not.toHaveBeenCalled();
  });

  it('should fall back to a later rule when earlier ones miss', () => {
    const extractor = new FieldExtractor('card_holder', [
      new PatternRule('Cardholder Name:\\s*([A-Z ]+)'),
      new PatternRule('Dear ([A-Z ]+),'),
    ]);

    const match = extractor.extractWithSource(text);

    expect(match?.value).toBe('RAVI KUMAR');
    expect(match?.ruleIndex).toBe(1);
  });

  it('should return null when no rule matches', () => {
    const extractor = new FieldExtractor('payment_due_date', [new PatternRule('Pay by:\\s*(\\S+)')]);

    expect(extractor.extract(text)).toBeNull();
    expect(extractor.extractWithSource(text)).toBeNull();
  });

  it('should give the same result on repeated calls', () => {
    const extractor = new FieldExtractor('total_amount_due', [new PatternRule('Amount Due:\\s*Rs\\.\\s*([\\d,.]+)')]);

    const results = [extractor.extract(text), extractor.extract(text), extractor.extract(text)];

    expect(results).toEqual(['₹7,000.00', '₹7,000.00', '₹7,000.00']);
  });

  it('should require at least one rule', () => {
    expect(() => new FieldExtractor('card_holder', [])).toThrow('Field extractor for "card_holder" needs at least one rule');
  });

  it('should not be affected by changes to the array it was built from', () => {
    const rules = [new PatternRule('Dear ([A-Z ]+),')];
    const extractor = new FieldExtractor('card_holder', rules);
    rules.unshift(new PatternRule('Card Holder:\\s*([A-Z ]+)'));

    expect(extractor.rules).toHaveLength(1);
    expect(extractor.extract(text)).toBe('RAVI KUMAR');
  });
});
