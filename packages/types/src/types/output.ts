/**
 * Output envelope written by the CLI.
 * Kept in step with schemas/statement-output.schema.json.
 */

import type { ExtractionOutcome } from '../schemas/statement.js';

export type ISODateTime = string;

export type SourceFileType = 'pdf' | 'txt';

export interface SourceFile {
  fileName: string;
  fileType: SourceFileType;
  pageCount: number;
}

export interface FileResult {
  source: SourceFile;
  outcome: ExtractionOutcome;
}

export interface FileErrorRecord {
  fileName: string;
  filePath: string;
  error: string;
  timestamp: ISODateTime;
}

export interface OutputMetadata {
  parser: {
    name: string;
    version: string;
  };
  parsedAt: ISODateTime;
  warnings: string[];
}

export interface StatementFileOutput {
  schemaVersion: '1.0.0';
  results: FileResult[];
  fileErrors?: FileErrorRecord[];
  metadata: OutputMetadata;
}
