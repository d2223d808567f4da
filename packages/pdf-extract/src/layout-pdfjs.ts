/**
 * Layout-aware PDF text extraction using pdfjs-dist.
 *
 * Text items carry positional coordinates; lines are rebuilt by grouping items that
 * share a baseline, so label/value pairs printed in separate text runs
 * ("Payment Due Date" ... "15 Oct 2025") end up on one line.
 */
import { readFile } from 'fs/promises';

/**
 * A text item with positional information extracted from PDF.
 */
export interface TextItem {
  /** The text content */
  str: string;
  /** X coordinate (left edge) in PDF units */
  x: number;
  /** Y coordinate in PDF units (origin bottom-left) */
  y: number;
  /** Width of the text item */
  width: number;
  /** Height of the text item (approximated from font size) */
  height: number;
  /** Page number (1-indexed) */
  page: number;
}

export interface PdfMetadata {
  title?: string | undefined;
  author?: string | undefined;
  creationDate?: string | undefined;
}

export interface LayoutExtractedPDF {
  items: TextItem[];
  totalPages: number;
  metadata: PdfMetadata;
}

interface PdfjsTextItemLike {
  str: string;
  transform: unknown[];
  width?: unknown;
  height?: unknown;
}

export async function extractTextItems(filePath: string): Promise<LayoutExtractedPDF> {
  const dataBuffer = await readFile(filePath);
  return extractTextItemsFromBuffer(new Uint8Array(dataBuffer));
}

export async function extractTextItemsFromBuffer(buffer: Buffer | Uint8Array): Promise<LayoutExtractedPDF> {
  // Dynamic import: pdfjs-dist is ESM-only and heavy, load it on first use
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const data = buffer instanceof Buffer ? new Uint8Array(buffer) : buffer;

  const loadingTask = pdfjs.getDocument({
    data,
    useSystemFonts: true,
  });

  const pdfDocument = await loadingTask.promise;
  const items: TextItem[] = [];
  const numPages = pdfDocument.numPages;

  try {
    for (let pageNum = 1; pageNum <= numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();
      const contentItems: unknown[] = textContent.items;

      for (const item of contentItems) {
        // Marked-content entries carry no text
        if (!isTextItem(item)) continue;

        const str = item.str.trim();
        if (str.length === 0) continue;

        // transform = [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const transform = item.transform;
        const x = Number(transform[4]) || 0;
        const y = Number(transform[5]) || 0;

        const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * str.length * 0.6;
        const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);

        items.push({
          str,
          x,
          y,
          width,
          height,
          page: pageNum,
        });
      }
    }

    const metadata = await readMetadata(() => pdfDocument.getMetadata());

    return {
      items,
      totalPages: numPages,
      metadata,
    };
  } finally {
    await pdfDocument.destroy();
  }
}

async function readMetadata(load: () => Promise<{ info: unknown }>): Promise<PdfMetadata> {
  let info: unknown;
  try {
    ({ info } = await load());
  } catch {
    // Documents with a broken info dictionary still have usable text
    return {};
  }

  return {
    title: readInfoString(info, 'Title'),
    author: readInfoString(info, 'Author'),
    creationDate: readInfoString(info, 'CreationDate'),
  };
}

function readInfoString(info: unknown, key: string): string | undefined {
  if (typeof info !== 'object' || info === null || !(key in info)) {
    return undefined;
  }
  const value: unknown = Reflect.get(info, key);
  return typeof value === 'string' ? value : undefined;
}

function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}

/**
 * Rebuild lines from positioned text items.
 * Items within Y_TOL of each other share a row; wide horizontal gaps become a tab so
 * neighbouring columns are not glued together.
 */
export function buildLinesFromItems(items: TextItem[]): string[] {
  const Y_TOL = 2.0;
  const SPACE_GAP = 2.5;
  const COLUMN_GAP = 18;

  if (items.length === 0) return [];

  // Top to bottom, then left to right
  const sorted = [...items].sort((a, b) => (b.y - a.y) || (a.x - b.x));

  const rows: TextItem[][] = [];
  let currentRow: TextItem[] = [];
  let rowY = 0;
  for (const item of sorted) {
    if (currentRow.length > 0 && Math.abs(item.y - rowY) <= Y_TOL) {
      currentRow.push(item);
      continue;
    }
    currentRow = [item];
    rowY = item.y;
    rows.push(currentRow);
  }

  const lines: string[] = [];
  for (const row of rows) {
    row.sort((a, b) => a.x - b.x);

    let out = '';
    let prevEndX: number | null = null;

    for (const item of row) {
      if (prevEndX !== null) {
        const gap = item.x - prevEndX;
        if (gap > COLUMN_GAP) {
          out += '\t';
        } else if (gap > SPACE_GAP) {
          out += ' ';
        }
      }

      out += item.str;
      prevEndX = item.x + item.width;
    }

    const cleaned = out.replace(/[ \t]+$/g, '');
    if (cleaned) {
      lines.push(cleaned);
    }
  }

  return lines;
}

export function buildLinesForPage(items: TextItem[], pageNumber: number): string[] {
  return buildLinesFromItems(items.filter((item) => item.page === pageNumber));
}
