import type { LayoutDocument, Line, Page, StyledSpan } from '../types';
import { unionBox } from '../types';

export interface SpanInit {
  x?: number;
  y?: number;
  size?: number;
  bold?: boolean;
  italic?: boolean;
  font?: string;
  width?: number;
}

/**
 * Span at (x, y) whose box is half the font size wide per character.
 */
export function span(text: string, init: SpanInit = {}): StyledSpan {
  const size = init.size ?? 10;
  const x0 = init.x ?? 72;
  const y0 = init.y ?? 100;
  const width = init.width ?? text.length * size * 0.5;
  return {
    text,
    bbox: { x0, y0, x1: x0 + width, y1: y0 + size },
    fontSize: size,
    bold: init.bold ?? false,
    italic: init.italic ?? false,
    fontName: init.font ?? '',
  };
}

export function line(...spans: StyledSpan[]): Line {
  return { spans, bbox: unionBox(spans.map(s => s.bbox)) };
}

/** One-span line */
export function textLine(text: string, init: SpanInit = {}): Line {
  return line(span(text, init));
}

export function page(pageNumber: number, lines: Line[]): Page {
  return { pageNumber, width: 612, height: 792, lines };
}

export function doc(fileName: string, pages: Page[], title?: string): LayoutDocument {
  return { fileName, metadata: title === undefined ? {} : { title }, pages };
}

export const heading = { size: 18, bold: true, font: 'Arial-Bold' } as const;
