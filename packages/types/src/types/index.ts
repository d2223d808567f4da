export type {
  ISODateTime,
  SourceFileType,
  SourceFile,
  FileResult,
  FileErrorRecord,
  OutputMetadata,
  StatementFileOutput,
} from './output.js';
