import type { FieldName } from '@cardparse/types';
import type { PatternRule } from './pattern-rule.js';
import { normalizeValue } from './normalizer.js';

export interface FieldMatch {
  value: string;
  /** Position of the winning rule in the fallback chain */
  ruleIndex: number;
  rule: PatternRule;
}

/**
 * Fallback chain for one field. Rules run in declared order and the first rule that
 * yields a capture wins; later rules are never consulted.
 */
export class FieldExtractor {
  readonly field: FieldName;
  readonly rules: readonly PatternRule[];

  constructor(field: FieldName, rules: readonly PatternRule[]) {
    if (rules.length === 0) {
      throw new Error(`Field extractor for "${field}" needs at least one rule`);
    }
    this.field = field;
    this.rules = Object.freeze([...rules]);
  }

  extract(text: string): string | null {
    return this.extractWithSource(text)?.value ?? null;
  }

  extractWithSource(text: string): FieldMatch | null {
    for (const [ruleIndex, rule] of this.rules.entries()) {
      const capture = rule.match(text);
      if (capture !== null) {
        return { value: normalizeValue(this.field, capture), ruleIndex, rule };
      }
    }
    return null;
  }
}
