import { z } from 'zod';
import { LAST_DIGITS_LENGTH, MIN_TEXT_LENGTH } from '../utils/constants.js';

export const FIELD_NAMES = [
  'card_holder',
  'last_4_digits',
  'billing_cycle',
  'payment_due_date',
  'total_amount_due',
] as const;

export const FieldNameSchema = z.enum(FIELD_NAMES);
export type FieldName = z.infer<typeof FieldNameSchema>;

export const ExtractedFieldsSchema = z.object({
  card_holder: z.string().min(1).nullable(),
  last_4_digits: z
    .string()
    .regex(new RegExp(`^\\d{${LAST_DIGITS_LENGTH}}$`), `Must be exactly ${LAST_DIGITS_LENGTH} digits`)
    .nullable(),
  billing_cycle: z.string().min(1).nullable(),
  payment_due_date: z.string().min(1).nullable(),
  total_amount_due: z.string().min(1).nullable(),
});
export type ExtractedFields = z.infer<typeof ExtractedFieldsSchema>;

export const ParsedStatementSchema = ExtractedFieldsSchema.extend({
  issuer: z.string().min(1),
});
export type ParsedStatement = z.infer<typeof ParsedStatementSchema>;

export const FailureKindSchema = z.enum(['NoText', 'BankNotDetected']);
export type FailureKind = z.infer<typeof FailureKindSchema>;

export const ExtractionFailureSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('NoText'),
    message: z.string(),
  }),
  z.object({
    kind: z.literal('BankNotDetected'),
    message: z.string(),
    supportedIssuers: z.array(z.string()),
  }),
]);
export type ExtractionFailure = z.infer<typeof ExtractionFailureSchema>;

export const ExtractionOutcomeSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    statement: ParsedStatementSchema,
    matchedIssuers: z.array(z.string()).min(1),
  }),
  z.object({
    ok: z.literal(false),
    error: ExtractionFailureSchema,
  }),
]);
export type ExtractionOutcome = z.infer<typeof ExtractionOutcomeSchema>;

export const ParserOptionsSchema = z.object({
  minTextLength: z.number().int().nonnegative().default(MIN_TEXT_LENGTH),
});
export type ParserOptions = z.infer<typeof ParserOptionsSchema>;
export type ParserOptionsInput = z.input<typeof ParserOptionsSchema>;
