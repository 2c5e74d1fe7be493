/**
 * Shared types for source adapters.
 *
 * An adapter turns some external representation (a PDF, a serialized layout
 * file) into a LayoutDocument. The shapes below mirror what pdf.js hands out
 * from getTextContent(), kept loose so the converter can be fed plain
 * objects in tests.
 */

import type { LayoutDocument } from '../types';

/** Opens a document from disk. Batch and collection mode take one of these. */
export type DocumentLoader = (path: string) => Promise<LayoutDocument>;

export interface PdfJsTextItem {
  str: string;
  transform: number[];  // [a, b, c, d, e, f] in PDF user space
  width: number;
  height: number;
  fontName: string;
  hasEOL?: boolean;
}

export interface PdfJsFontInfo {
  name: string;         // subset prefix removed
  bold: boolean;
  italic: boolean;
}

export interface PdfJsPageContent {
  pageNumber: number;   // 1-based
  width: number;
  height: number;
  items: PdfJsTextItem[];
  fonts?: Record<string, PdfJsFontInfo>;
  /** Viewport transform; defaults to a y-flip at scale 1 */
  viewportTransform?: number[];
}
