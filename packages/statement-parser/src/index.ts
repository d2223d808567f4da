// Pattern rules
export { PatternRule, countCaptureGroups, type RawCapture } from './rules/pattern-rule.js';
export { FieldExtractor, type FieldMatch } from './rules/field-extractor.js';
export { normalizeValue, FIELD_KINDS, type FieldKind } from './rules/normalizer.js';

// Institution profiles
export {
  InstitutionProfile,
  loadProfileTable,
  parseProfileTable,
  getProfileTablePath,
  PROFILE_DIR,
} from './profiles/index.js';
export type { InstitutionProfileInit, FieldExtractors } from './profiles/index.js';

// Registry and detection
export {
  REGISTRY_ORDER,
  DEFAULT_REGISTRY,
  createRegistry,
  loadDefaultRegistry,
  getSupportedIssuers,
  getProfile,
  type ProfileId,
  type ProfileRegistry,
} from './registry.js';
export { detectBank, detectAllBanks } from './detector.js';

// Orchestration
export { parseStatementText } from './parse-statement.js';
export { parseStatementFile, type FileParseResult } from './parse-file.js';

// Batch processor
export {
  processBatch,
  type FileError,
  type FileOutcome,
  type BatchProcessResult,
  type BatchProcessOptions,
} from './batch-processor.js';

