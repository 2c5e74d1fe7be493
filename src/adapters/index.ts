/**
 * Source adapters for turning external layout data into a LayoutDocument.
 *
 * Each adapter produces pages of lines of styled spans with top-left
 * page-unit boxes, which is all the outline engine reads.
 */

// Shared types
export type {
  DocumentLoader,
  PdfJsTextItem,
  PdfJsFontInfo,
  PdfJsPageContent,
} from './types';

// pdf.js (text-layer PDFs)
export { loadPdf, parsePdf, fromPdfJsPage, fontInfoFromName } from './pdfjs';

// Pre-parsed layout JSON
export { parseLayoutDocument, loadLayoutFile, layoutDocumentSchema } from './layout-json';
export type { LayoutJson } from './layout-json';
