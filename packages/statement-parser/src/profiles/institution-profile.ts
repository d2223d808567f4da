import { FIELD_NAMES, type ExtractedFields, type FieldName, type ProfileTable } from '@cardparse/types';
import { FieldExtractor, type FieldMatch } from '../rules/field-extractor.js';
import { PatternRule } from '../rules/pattern-rule.js';

export type FieldExtractors = Readonly<Record<FieldName, FieldExtractor>>;

export interface InstitutionProfileInit {
  id: string;
  issuerName: string;
  keywords: readonly string[];
  extractors: FieldExtractors;
}

/**
 * Everything needed to recognise and read one issuer's statements: the keywords that
 * identify its documents and a fallback chain for each field.
 */
export class InstitutionProfile {
  readonly id: string;
  readonly issuerName: string;
  readonly keywords: readonly string[];
  readonly extractors: FieldExtractors;
  private readonly needles: readonly string[];

  constructor(init: InstitutionProfileInit) {
    if (init.keywords.length === 0) {
      throw new Error(`Profile "${init.id}" needs at least one keyword`);
    }
    for (const field of FIELD_NAMES) {
      if (init.extractors[field].field !== field) {
        throw new Error(
          `Profile "${init.id}" maps ${field} to an extractor for ${init.extractors[field].field}`
        );
      }
    }

    this.id = init.id;
    this.issuerName = init.issuerName;
    this.keywords = Object.freeze([...init.keywords]);
    this.needles = Object.freeze(init.keywords.map((k) => k.toLowerCase()));
    this.extractors = Object.freeze({ ...init.extractors });
  }

  static fromTable(table: ProfileTable): InstitutionProfile {
    const build = (field: FieldName): FieldExtractor =>
      new FieldExtractor(
        field,
        table.fields[field].map((spec, index) => {
          try {
            return PatternRule.fromSpec(spec);
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Profile "${table.id}" ${field} rule ${index}: ${message}`, { cause: error });
          }
        })
      );

    return new InstitutionProfile({
      id: table.id,
      issuerName: table.issuer,
      keywords: table.keywords,
      extractors: {
        card_holder: build('card_holder'),
        last_4_digits: build('last_4_digits'),
        billing_cycle: build('billing_cycle'),
        payment_due_date: build('payment_due_date'),
        total_amount_due: build('total_amount_due'),
      },
    });
  }

  /** True when any keyword occurs in the text, ignoring case. */
  validate(text: string): boolean {
    const haystack = text.toLowerCase();
    return this.needles.some((needle) => haystack.includes(needle));
  }

  /** Run every field's chain independently against the same text. */
  extractAll(text: string): ExtractedFields {
    return {
      card_holder: this.extractors.card_holder.extract(text),
      last_4_digits: this.extractors.last_4_digits.extract(text),
      billing_cycle: this.extractors.billing_cycle.extract(text),
      payment_due_date: this.extractors.payment_due_date.extract(text),
      total_amount_due: this.extractors.total_amount_due.extract(text),
    };
  }

  /** Per-field winning rule, for diagnostics. */
  explain(text: string): Record<FieldName, FieldMatch | null> {
    return {
      card_holder: this.extractors.card_holder.extractWithSource(text),
      last_4_digits: this.extractors.last_4_digits.extractWithSource(text),
      billing_cycle: this.extractors.billing_cycle.extractWithSource(text),
      payment_due_date: this.extractors.payment_due_date.extractWithSource(text),
      total_amount_due: this.extractors.total_amount_due.extractWithSource(text),
    };
  }
}
