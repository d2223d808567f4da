import { GroupPolicySchema, type GroupPolicy, type GroupPolicyInput, type PatternRuleSpec } from '@cardparse/types';

/** A single capture, or the start and end of a range captured by separate groups. */
export type RawCapture = string | readonly [start: string, end: string];

const DIGITS_ONLY = /^\d+$/;

/**
 * One compiled, case-insensitive pattern plus the policy that turns its match into a
 * capture. The expression is compiled without the global or sticky flags, so `exec`
 * keeps no state between calls and a rule can be shared freely.
 */
export class PatternRule {
  readonly regex: RegExp;
  readonly policy: GroupPolicy;
  readonly note: string | undefined;

  constructor(source: string, policy: GroupPolicyInput = { select: 'group' }, note?: string) {
    this.regex = new RegExp(source, 'i');
    this.policy = GroupPolicySchema.parse(policy);
    this.note = note;

    const available = countCaptureGroups(source);
    const required = highestGroup(this.policy);
    if (required > available) {
      throw new Error(
        `Pattern /${source}/ has ${available} capture group(s) but its "${this.policy.select}" policy needs group ${required}`
      );
    }
  }

  static fromSpec(spec: PatternRuleSpec): PatternRule {
    return new PatternRule(spec.pattern, spec.policy, spec.note);
  }

  get source(): string {
    return this.regex.source;
  }

  /**
   * Match against the first occurrence anywhere in `text`.
   * Returns null when the pattern does not match or the selected groups are missing
   * or blank.
   */
  match(text: string): RawCapture | null {
    const match = this.regex.exec(text);
    if (match === null) return null;

    switch (this.policy.select) {
      case 'group': {
        const value = match[this.policy.group];
        return isPresent(value) ? value : null;
      }
      case 'last': {
        const groups = match.slice(1, this.policy.groups + 1);
        if (groups.length < this.policy.groups) return null;
        if (!groups.every((g) => g !== undefined && DIGITS_ONLY.test(g))) return null;
        const last = groups[groups.length - 1];
        return isPresent(last) ? last : null;
      }
      case 'pair': {
        const start = match[this.policy.start];
        const end = match[this.policy.end];
        if (!isPresent(start) || !isPresent(end)) return null;
        return [start, end];
      }
    }
  }
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

function highestGroup(policy: GroupPolicy): number {
  switch (policy.select) {
    case 'group':
      return policy.group;
    case 'last':
      return policy.groups;
    case 'pair':
      return Math.max(policy.start, policy.end);
  }
}

/** Number of capturing groups in a pattern, found by matching it against "" through an empty alternative. */
export function countCaptureGroups(source: string): number {
  const probe = new RegExp(`(?:${source})|`).exec('');
  return probe === null ? 0 : probe.length - 1;
}
