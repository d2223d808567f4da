import {
  FIELD_NAMES,
  OUTPUT_SCHEMA_VERSION,
  PARSER_NAME,
  PARSER_VERSION,
  type ExtractionOutcome,
  type FileErrorRecord,
  type FileResult,
  type SourceFile,
  type StatementFileOutput,
} from '@cardparse/types';

export interface DocumentSummary extends SourceFile {
  sparse: boolean;
}

export function toFileResult(document: DocumentSummary, outcome: ExtractionOutcome): FileResult {
  return {
    source: {
      fileName: document.fileName,
      fileType: document.fileType,
      pageCount: document.pageCount,
    },
    outcome,
  };
}

/**
 * Warnings for one parsed file: a sparse text layer, more than one accepting
 * issuer, and fields no rule found.
 */
export function collectWarnings(document: DocumentSummary, outcome: ExtractionOutcome): string[] {
  const warnings: string[] = [];
  const { fileName } = document;

  if (document.sparse) {
    warnings.push(`${fileName}: text layer is sparse, the document may need OCR`);
  }

  if (!outcome.ok) {
    return warnings;
  }

  const [chosen, ...others] = outcome.matchedIssuers;
  if (chosen !== undefined && others.length > 0) {
    warnings.push(`${fileName}: text matched several issuers (${outcome.matchedIssuers.join(', ')}), using ${chosen}`);
  }

  const missing = FIELD_NAMES.filter((field) => outcome.statement[field] === null);
  if (missing.length > 0) {
    warnings.push(`${fileName}: no value found for ${missing.join(', ')}`);
  }

  return warnings;
}

export function buildOutput(
  results: FileResult[],
  warnings: string[],
  fileErrors: FileErrorRecord[] = [],
  parsedAt: Date = new Date()
): StatementFileOutput {
  const output: StatementFileOutput = {
    schemaVersion: OUTPUT_SCHEMA_VERSION,
    results,
    metadata: {
      parser: { name: PARSER_NAME, version: PARSER_VERSION },
      parsedAt: parsedAt.toISOString(),
      warnings,
    },
  };

  if (fileErrors.length > 0) {
    output.fileErrors = fileErrors;
  }

  return output;
}

/** True when nothing in the run produced a parsed statement. */
export function allInputsFailed(output: StatementFileOutput): boolean {
  return !output.results.some((result) => result.outcome.ok);
}
