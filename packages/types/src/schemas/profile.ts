import { z } from 'zod';

/**
 * How a matched pattern becomes a raw capture.
 *
 * - `group`: a single capture group (group 1 unless stated).
 * - `last`: the last of `groups` capture groups; every group must be present and numeric.
 *   Used for bare full card numbers printed as four digit blocks.
 * - `pair`: a start and an end group, joined later into a range. Both must be present.
 */
export const GroupPolicySchema = z.discriminatedUnion('select', [
  z.object({
    select: z.literal('group'),
    group: z.number().int().positive().default(1),
  }),
  z.object({
    select: z.literal('last'),
    groups: z.number().int().min(2),
  }),
  z.object({
    select: z.literal('pair'),
    start: z.number().int().positive().default(1),
    end: z.number().int().positive().default(2),
  }),
]);
export type GroupPolicy = z.infer<typeof GroupPolicySchema>;
export type GroupPolicyInput = z.input<typeof GroupPolicySchema>;

export const PatternRuleSpecSchema = z.object({
  pattern: z.string().min(1),
  policy: GroupPolicySchema.default({ select: 'group', group: 1 }),
  note: z.string().optional(),
});
export type PatternRuleSpec = z.infer<typeof PatternRuleSpecSchema>;
export type PatternRuleSpecInput = z.input<typeof PatternRuleSpecSchema>;

const RuleListSchema = z.array(PatternRuleSpecSchema).min(1);

export const ProfileTableSchema = z.object({
  id: z.string().regex(/^[a-z][a-z0-9-]*$/, 'Profile id must be lowercase kebab-case'),
  issuer: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  fields: z.object({
    card_holder: RuleListSchema,
    last_4_digits: RuleListSchema,
    billing_cycle: RuleListSchema,
    payment_due_date: RuleListSchema,
    total_amount_due: RuleListSchema,
  }),
});
export type ProfileTable = z.infer<typeof ProfileTableSchema>;
export type ProfileTableInput = z.input<typeof ProfileTableSchema>;
