// PDF extraction
export { extractPDF, extractPDFFromBuffer } from './pdf-extractor.js';

export type { ExtractedPage, ExtractedPDF } from './pdf-extractor.js';

// Layout-aware extraction using pdfjs-dist
export {
  extractTextItems,
  extractTextItemsFromBuffer,
  buildLinesFromItems,
  buildLinesForPage,
} from './layout-pdfjs.js';

export type { TextItem, LayoutExtractedPDF, PdfMetadata } from './layout-pdfjs.js';

// Document text acquisition
export { loadDocumentText, resolveFileType, isSparseText, SUPPORTED_EXTENSIONS } from './text-source.js';

export type { DocumentText } from './text-source.js';

// Directory scanning and access errors
export { scanForDocuments, temporaryFileReason } from './document-scanner.js';
export { DocumentAccessError } from './errors.js';

export type { DocumentFile, DocumentScan, SkippedDocument } from './document-scanner.js';
export type { AccessTarget } from './errors.js';
