import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join, normalize } from 'path';
import type { SourceFileType } from '@cardparse/types';
import { resolveFileType } from './text-source.js';
import { DocumentAccessError } from './errors.js';

export interface DocumentFile {
  filePath: string;
  fileName: string;
  fileType: SourceFileType;
}

export interface SkippedDocument {
  fileName: string;
  reason: string;
}

export interface DocumentScan {
  directoryPath: string;
  files: DocumentFile[];
  skipped: SkippedDocument[];
}

/** Office lock files (`~$`) and dotfiles are never statements. */
export function temporaryFileReason(fileName: string): string | null {
  if (fileName.startsWith('~$')) return 'Office lock file';
  if (fileName.startsWith('.')) return 'Hidden file';
  return null;
}

/**
 * List the statement documents (.pdf, .txt) directly inside a directory, sorted by
 * name. Lock files, hidden files and empty files are reported in `skipped`.
 *
 * A directory that cannot be listed throws a DocumentAccessError. A file that cannot
 * be inspected is still listed, so reading it later reports the failure for that
 * file alone.
 */
export async function scanForDocuments(directoryPath: string): Promise<DocumentScan> {
  const dir = normalize(directoryPath);

  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw DocumentAccessError.from(error, dir, 'directory');
  }

  const files: DocumentFile[] = [];
  const skipped: SkippedDocument[] = [];

  for (const entry of entries) {
    if (!entry.isFile() && !entry.isSymbolicLink()) continue;

    const fileType = resolveFileType(entry.name);
    if (fileType === null) continue;

    const temporary = temporaryFileReason(entry.name);
    if (temporary !== null) {
      skipped.push({ fileName: entry.name, reason: temporary });
      continue;
    }

    const filePath = join(dir, entry.name);
    if (await isEmptyFile(filePath)) {
      skipped.push({ fileName: entry.name, reason: 'Empty file' });
      continue;
    }

    files.push({ filePath, fileName: entry.name, fileType });
  }

  files.sort((a, b) => a.fileName.localeCompare(b.fileName));

  return { directoryPath: dir, files, skipped };
}

async function isEmptyFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).size === 0;
  } catch {
    // Left for the loader, which records the error against this file
    return false;
  }
}
