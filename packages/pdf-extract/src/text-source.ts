import { access, constants, readFile } from 'fs/promises';
import { basename, extname } from 'path';
import { SPARSE_TEXT_THRESHOLD, type SourceFileType } from '@cardparse/types';
import { extractPDF } from './pdf-extractor.js';
import { DocumentAccessError } from './errors.js';

export interface DocumentText {
  fileName: string;
  fileType: SourceFileType;
  text: string;
  pageCount: number;
  /**
   * True when the text is too short to be a real statement. Usually a scanned PDF
   * whose pages are images; OCR it before parsing.
   */
  sparse: boolean;
}

export const SUPPORTED_EXTENSIONS: Readonly<Record<string, SourceFileType>> = {
  '.pdf': 'pdf',
  '.txt': 'txt',
};

export function resolveFileType(filePath: string): SourceFileType | null {
  return SUPPORTED_EXTENSIONS[extname(filePath).toLowerCase()] ?? null;
}

export function isSparseText(text: string, threshold: number = SPARSE_TEXT_THRESHOLD): boolean {
  return text.trim().length < threshold;
}

/**
 * Produce the raw text of a statement document: PDFs through pdfjs-dist, `.txt`
 * files as UTF-8 (already OCR'd or exported text).
 *
 * A file that cannot be opened throws a DocumentAccessError carrying the system
 * error code.
 */
export async function loadDocumentText(filePath: string): Promise<DocumentText> {
  const fileName = basename(filePath);
  const fileType = resolveFileType(filePath);

  if (fileType === null) {
    throw new Error(
      `Unsupported file type "${extname(filePath)}" for ${fileName}. Supported: ${Object.keys(SUPPORTED_EXTENSIONS).join(', ')}`
    );
  }

  if (fileType === 'txt') {
    const text = await readFile(filePath, 'utf-8').catch((error: unknown) => {
      throw DocumentAccessError.from(error, filePath, 'file');
    });
    return { fileName, fileType, text, pageCount: 1, sparse: isSparseText(text) };
  }

  await access(filePath, constants.R_OK).catch((error: unknown) => {
    throw DocumentAccessError.from(error, filePath, 'file');
  });
  const pdf = await extractPDF(filePath);
  return {
    fileName,
    fileType,
    text: pdf.fullText,
    pageCount: Math.max(pdf.totalPages, 1),
    sparse: isSparseText(pdf.fullText),
  };
}
