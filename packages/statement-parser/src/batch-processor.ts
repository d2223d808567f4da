import { DocumentAccessError, type DocumentFile } from '@cardparse/pdf-extract';
import type { FileErrorRecord, ParserOptionsInput } from '@cardparse/types';
import { parseStatementFile, type FileParseResult } from './parse-file.js';
import { DEFAULT_REGISTRY, type ProfileRegistry } from './registry.js';

export interface FileError extends FileErrorRecord {
  /** System error code (ENOENT, EACCES, ...) when the file could not be opened */
  code: string | undefined;
  stack: string | undefined;
}

export interface FileOutcome extends FileParseResult {
  file: DocumentFile;
}

export interface BatchProcessResult {
  outcomes: FileOutcome[];
  fileErrors: FileError[];
  summary: {
    totalFilesFound: number;
    filesParsed: number;
    filesFailedExtraction: number;
    filesErrored: number;
  };
}

export interface BatchProcessOptions {
  parserOptions?: ParserOptionsInput;
  registry?: ProfileRegistry;
  onProgress?: (current: number, total: number, fileName: string) => void;
  onError?: (error: FileError) => void;
}

/**
 * Parses statement files one after another.
 *
 * A file that cannot be read or decoded is recorded in `fileErrors` and the batch
 * moves on; NoText and BankNotDetected results are ordinary outcomes.
 */
export async function processBatch(
  files: DocumentFile[],
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const outcomes: FileOutcome[] = [];
  const fileErrors: FileError[] = [];
  const registry = options.registry ?? DEFAULT_REGISTRY;

  for (const [index, file] of files.entries()) {
    options.onProgress?.(index + 1, files.length, file.fileName);

    try {
      const result = await parseStatementFile(file.filePath, options.parserOptions ?? {}, registry);
      outcomes.push({ file, ...result });
    } catch (error) {
      const fileError: FileError = {
        fileName: file.fileName,
        filePath: file.filePath,
        error: error instanceof Error ? error.message : String(error),
        code: error instanceof DocumentAccessError ? error.code : undefined,
        stack: error instanceof Error ? error.stack : undefined,
        timestamp: new Date().toISOString(),
      };
      fileErrors.push(fileError);
      options.onError?.(fileError);
    }
  }

  const filesParsed = outcomes.filter((o) => o.outcome.ok).length;

  return {
    outcomes,
    fileErrors,
    summary: {
      totalFilesFound: files.length,
      filesParsed,
      filesFailedExtraction: outcomes.length - filesParsed,
      filesErrored: fileErrors.length,
    },
  };
}
