export {
  FIELD_NAMES,
  FieldNameSchema,
  ExtractedFieldsSchema,
  ParsedStatementSchema,
  FailureKindSchema,
  ExtractionFailureSchema,
  ExtractionOutcomeSchema,
  ParserOptionsSchema,
} from './statement.js';

export type {
  FieldName,
  ExtractedFields,
  ParsedStatement,
  FailureKind,
  ExtractionFailure,
  ExtractionOutcome,
  ParserOptions,
  ParserOptionsInput,
} from './statement.js';

export {
  GroupPolicySchema,
  PatternRuleSpecSchema,
  ProfileTableSchema,
} from './profile.js';

export type {
  GroupPolicy,
  GroupPolicyInput,
  PatternRuleSpec,
  PatternRuleSpecInput,
  ProfileTable,
  ProfileTableInput,
} from './profile.js';
