import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocumentProxy, PDFPageProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { BoundingBox, LayoutDocument, Line, Page, StyledSpan } from '../types';
import { unionBox } from '../types';
import { DocumentOpenError } from '../errors';
import { logger } from '../logger';
import type { PdfJsFontInfo, PdfJsPageContent, PdfJsTextItem } from './types';

/**
 * pdf.js adapter
 *
 * Library: pdfjs-dist (legacy build, runs under plain Node)
 * Output: getTextContent() items, one per text run, positioned by a 2x3
 *         matrix in PDF user space (origin bottom-left)
 * Conversion: items are mapped through the viewport transform to top-left
 *         page units, then grouped into lines by baseline
 */

// ============================================================================
// Geometry
// ============================================================================

/** Share of the font size above the baseline */
const ASCENT = 0.8;
/** Max baseline drift, in font sizes, inside one line */
const BASELINE_TOLERANCE = 0.5;
/** Horizontal gap, in font sizes, that starts a new line */
const MAX_GAP = 1.5;
/** Horizontal gap, in font sizes, that implies a word space */
const WORD_GAP = 0.15;

function multiply(m1: number[], m2: number[]): number[] {
  return [
    m1[0] * m2[0] + m1[2] * m2[1],
    m1[1] * m2[0] + m1[3] * m2[1],
    m1[0] * m2[2] + m1[2] * m2[3],
    m1[1] * m2[2] + m1[3] * m2[3],
    m1[0] * m2[4] + m1[2] * m2[5] + m1[4],
    m1[1] * m2[4] + m1[3] * m2[5] + m1[5],
  ];
}

interface PositionedRun {
  text: string;
  fontName: string;
  fontSize: number;
  baseline: number;
  bbox: BoundingBox;
  endsLine: boolean;
}

function positionRun(item: PdfJsTextItem, viewport: number[]): PositionedRun {
  const tx = multiply(viewport, item.transform);
  const fontSize = Math.hypot(tx[2], tx[3]) || Math.abs(item.height) || 1;
  const x0 = tx[4];
  const baseline = tx[5];
  return {
    text: item.str,
    fontName: item.fontName,
    fontSize,
    baseline,
    bbox: {
      x0,
      y0: baseline - fontSize * ASCENT,
      x1: x0 + Math.max(0, item.width),
      y1: baseline + fontSize * (1 - ASCENT),
    },
    endsLine: item.hasEOL === true,
  };
}

// ============================================================================
// Fonts
// ============================================================================

const SUBSET_PREFIX = /^[A-Z]{6}\+/;
const BOLD_NAME = /bold|black|heavy|semibold|demi/i;
const ITALIC_NAME = /italic|oblique/i;

/**
 * Style flags for a font, taken from the resolved font object when pdf.js
 * provides one, otherwise guessed from the font's name.
 */
export function fontInfoFromName(rawName: string, flags: { bold?: boolean; italic?: boolean } = {}): PdfJsFontInfo {
  const name = rawName.replace(SUBSET_PREFIX, '');
  return {
    name,
    bold: flags.bold === true || BOLD_NAME.test(name),
    italic: flags.italic === true || ITALIC_NAME.test(name),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function resolveFont(page: PDFPageProxy, fontName: string, family: string | undefined): PdfJsFontInfo {
  const font: unknown = page.commonObjs.has(fontName) ? page.commonObjs.get(fontName) : undefined;
  if (!isRecord(font)) return fontInfoFromName(family ?? '');

  const name = typeof font.name === 'string' ? font.name : family ?? '';
  return fontInfoFromName(name, {
    bold: font.bold === true || font.black === true,
    italic: font.italic === true,
  });
}

// ============================================================================
// Conversion
// ============================================================================

function toSpan(run: PositionedRun, fonts: Record<string, PdfJsFontInfo>): StyledSpan {
  const font = fonts[run.fontName] ?? fontInfoFromName(run.fontName);
  return {
    text: run.text,
    bbox: run.bbox,
    fontSize: Math.round(run.fontSize * 100) / 100,
    bold: font.bold,
    italic: font.italic,
    fontName: font.name,
  };
}

/**
 * Convert one page of pdf.js text content into lines of styled spans.
 */
export function fromPdfJsPage(content: PdfJsPageContent): Page {
  const viewport = content.viewportTransform ?? [1, 0, 0, -1, 0, content.height];
  const fonts = content.fonts ?? {};
  const lines: Line[] = [];

  let spans: StyledSpan[] = [];
  let lineBaseline = 0;
  let lastRun: PositionedRun | undefined;

  const flush = () => {
    if (spans.length > 0) lines.push({ spans, bbox: unionBox(spans.map(s => s.bbox)) });
    spans = [];
    lastRun = undefined;
  };

  for (const item of content.items) {
    const run = positionRun(item, viewport);

    if (!run.text.trim()) {
      // Whitespace runs only separate words
      const last = spans[spans.length - 1];
      if (last && run.text && !/\s$/.test(last.text)) last.text += ' ';
      if (run.endsLine) flush();
      continue;
    }

    if (lastRun) {
      const drift = Math.abs(run.baseline - lineBaseline);
      const gap = run.bbox.x0 - lastRun.bbox.x1;
      if (drift > lastRun.fontSize * BASELINE_TOLERANCE || gap > lastRun.fontSize * MAX_GAP) {
        flush();
      } else if (gap > lastRun.fontSize * WORD_GAP) {
        const last = spans[spans.length - 1];
        if (last && !/\s$/.test(last.text) && !/^\s/.test(run.text)) last.text += ' ';
      }
    }

    if (spans.length === 0) lineBaseline = run.baseline;
    spans.push(toSpan(run, fonts));
    lastRun = run;

    if (run.endsLine) flush();
  }
  flush();

  return {
    pageNumber: content.pageNumber,
    width: content.width,
    height: content.height,
    lines,
  };
}

// ============================================================================
// Loading
// ============================================================================

function isTextItem<T>(item: T): item is T & PdfJsTextItem {
  return isRecord(item) && typeof item.str === 'string' && Array.isArray(item.transform);
}

async function readPage(pdf: PDFDocumentProxy, pageNumber: number): Promise<Page> {
  const page = await pdf.getPage(pageNumber);
  try {
    const viewport = page.getViewport({ scale: 1 });
    const textContent = await page.getTextContent();
    // Font objects land in commonObjs once the page's operators are loaded
    await page.getOperatorList();

    const items = textContent.items.filter(isTextItem);
    const fonts: Record<string, PdfJsFontInfo> = {};
    for (const item of items) {
      if (fonts[item.fontName]) continue;
      const style: unknown = textContent.styles[item.fontName];
      const family = isRecord(style) && typeof style.fontFamily === 'string' ? style.fontFamily : undefined;
      fonts[item.fontName] = resolveFont(page, item.fontName, family);
    }

    return fromPdfJsPage({
      pageNumber,
      width: viewport.width,
      height: viewport.height,
      items,
      fonts,
      viewportTransform: viewport.transform,
    });
  } finally {
    page.cleanup();
  }
}

async function readTitle(pdf: PDFDocumentProxy): Promise<string | undefined> {
  const { info } = await pdf.getMetadata();
  if (!isRecord(info)) return undefined;
  return typeof info.Title === 'string' && info.Title.trim() ? info.Title : undefined;
}

/**
 * Parse PDF bytes into a LayoutDocument.
 */
export async function parsePdf(data: Uint8Array, fileName: string): Promise<LayoutDocument> {
  let pdf: PDFDocumentProxy;
  try {
    pdf = await getDocument({
      data,
      isEvalSupported: false,
      disableFontFace: true,
      useSystemFonts: false,
      verbosity: 0,
    }).promise;
  } catch (err) {
    throw new DocumentOpenError(fileName, err);
  }

  try {
    const pages: Page[] = [];
    for (let n = 1; n <= pdf.numPages; n++) {
      pages.push(await readPage(pdf, n));
    }
    const title = await readTitle(pdf);
    logger.debug('Parsed PDF', { file: fileName, pages: pages.length });
    return { fileName, metadata: title ? { title } : {}, pages };
  } catch (err) {
    throw new DocumentOpenError(fileName, err);
  } finally {
    await pdf.destroy();
  }
}

/**
 * Read and parse a PDF file. Any failure surfaces as DocumentOpenError.
 */
export async function loadPdf(path: string): Promise<LayoutDocument> {
  let data: Uint8Array;
  try {
    data = new Uint8Array(await readFile(path));
  } catch (err) {
    throw new DocumentOpenError(path, err);
  }
  return parsePdf(data, basename(path));
}
