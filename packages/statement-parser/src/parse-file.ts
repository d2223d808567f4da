import { loadDocumentText, type DocumentText } from '@cardparse/pdf-extract';
import type { ExtractionOutcome, ParserOptionsInput } from '@cardparse/types';
import { parseStatementText } from './parse-statement.js';
import { DEFAULT_REGISTRY, type ProfileRegistry } from './registry.js';

export interface FileParseResult {
  document: Omit<DocumentText, 'text'>;
  outcome: ExtractionOutcome;
}

/**
 * Load a statement file and parse its text. Read and PDF errors propagate; parse
 * failures come back in `outcome`.
 */
export async function parseStatementFile(
  filePath: string,
  options: ParserOptionsInput = {},
  registry: ProfileRegistry = DEFAULT_REGISTRY
): Promise<FileParseResult> {
  const { text, ...document } = await loadDocumentText(filePath);
  return {
    document,
    outcome: parseStatementText(text, options, registry),
  };
}
