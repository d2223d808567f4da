import { extractTextItemsFromBuffer, buildLinesForPage, type PdfMetadata } from './layout-pdfjs.js';
import { readFile } from 'fs/promises';

export interface ExtractedPage {
  pageNumber: number;
  text: string;
  lines: string[];
}

export interface ExtractedPDF {
  pages: ExtractedPage[];
  fullText: string;
  totalPages: number;
  metadata: PdfMetadata;
}

export async function extractPDF(filePath: string): Promise<ExtractedPDF> {
  const dataBuffer = await readFile(filePath);
  return extractPDFFromBuffer(new Uint8Array(dataBuffer));
}

/**
 * Extract every page of a PDF with layout-aware line reconstruction.
 * Pages are joined with a blank line in `fullText`.
 */
export async function extractPDFFromBuffer(data: Uint8Array): Promise<ExtractedPDF> {
  const layoutResult = await extractTextItemsFromBuffer(data);

  const pages: ExtractedPage[] = [];
  for (let pageNum = 1; pageNum <= layoutResult.totalPages; pageNum++) {
    const lines = buildLinesForPage(layoutResult.items, pageNum);
    pages.push({
      pageNumber: pageNum,
      text: lines.join('\n'),
      lines,
    });
  }

  const fullText = pages.map((p) => p.text).join('\n\n');

  return {
    pages,
    fullText,
    totalPages: layoutResult.totalPages,
    metadata: layoutResult.metadata,
  };
}
