/**
 * Font inspection
 *
 * Diagnostic view of a document's typography: the font sizes used on the
 * first pages and the largest lines of each, plus the profile and title the
 * extractor would pick. Useful when tuning rules for a new document family.
 */

import type { LayoutDocument, TitleSource } from './types';
import { lineText } from './types';
import { OutlineExtractor } from './extractor';
import { extractTitle } from './title';

export interface InspectedLine {
  text: string;
  fontSize: number;
  bold: boolean;
  fontName: string;
  y: number;
}

export interface PageFontReport {
  page: number;
  fontSizes: number[];   // distinct, descending
  largest: InspectedLine[];
}

export interface FontReport {
  fileName: string;
  pageCount: number;
  profile: string;
  title: string;
  titleSource: TitleSource;
  pages: PageFontReport[];
}

export interface InspectOptions {
  /** Pages reported, from the first */
  pages?: number;
  /** Lines listed per page */
  linesPerPage?: number;
}

export function inspectDocument(document: LayoutDocument, options: InspectOptions = {}): FontReport {
  const pageLimit = options.pages ?? 5;
  const lineLimit = options.linesPerPage ?? 10;

  const profile = new OutlineExtractor().selectProfile(document);
  const title = extractTitle(document, profile);

  const pages = document.pages.slice(0, pageLimit).map(page => {
    const lines: InspectedLine[] = [];
    for (const line of page.lines) {
      const text = lineText(line).trim();
      const [first] = line.spans;
      if (!first || text.length <= 2) continue;
      lines.push({
        text,
        fontSize: first.fontSize,
        bold: first.bold,
        fontName: first.fontName,
        y: first.bbox.y0,
      });
    }

    const fontSizes = [...new Set(lines.map(l => l.fontSize))].sort((a, b) => b - a);
    // Stable sort keeps content order among equal sizes
    const largest = [...lines].sort((a, b) => b.fontSize - a.fontSize).slice(0, lineLimit);
    return { page: page.pageNumber, fontSizes, largest };
  });

  return {
    fileName: document.fileName,
    pageCount: document.pages.length,
    profile: profile.name,
    title: title.title,
    titleSource: title.source,
    pages,
  };
}

/**
 * Plain-text rendering of a font report.
 */
export function formatFontReport(report: FontReport): string {
  const out: string[] = [
    `File: ${report.fileName}`,
    `Pages: ${report.pageCount}`,
    `Profile: ${report.profile}`,
    `Title (${report.titleSource}): ${report.title}`,
  ];

  for (const page of report.pages) {
    out.push('', `=== PAGE ${page.page} ===`);
    out.push(`Font sizes: ${page.fontSizes.map(s => s.toFixed(1)).join(', ')}`);
    for (const line of page.largest) {
      const bold = line.bold ? ' [BOLD]' : '';
      const text = line.text.length > 80 ? `${line.text.slice(0, 80)}...` : line.text;
      out.push(`  ${line.fontSize.toFixed(1)}pt${bold}: ${text}`);
    }
  }

  return out.join('\n');
}
