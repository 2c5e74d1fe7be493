/**
 * Outline Types
 *
 * A layered document representation:
 *   Document → Pages → Lines → Spans
 *
 * Everything below is derived per document and read-only: the extractor
 * builds it fresh on each call and drops it once the outline is assembled.
 */

// ============================================================================
// Geometry
// ============================================================================

/**
 * Axis-aligned box in page units. Origin top-left, y grows downward.
 */
export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

// ============================================================================
// Layout Primitives
// ============================================================================

/**
 * A contiguous run of text with uniform styling on one line.
 */
export interface StyledSpan {
  text: string;
  bbox: BoundingBox;
  fontSize: number;
  bold: boolean;
  italic: boolean;
  fontName: string;   // may be empty
}

export interface Line {
  spans: StyledSpan[];
  bbox: BoundingBox;  // union of span boxes
}

export interface Page {
  pageNumber: number; // 1-based
  width: number;
  height: number;
  lines: Line[];      // content stream order, not necessarily top-to-bottom
}

export interface DocumentMetadata {
  title?: string;
}

export interface LayoutDocument {
  fileName: string;
  metadata: DocumentMetadata;
  pages: Page[];
}

// ============================================================================
// Derived Structures
// ============================================================================

export interface TableRegion {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface HeadingCandidate {
  text: string;
  page: number;         // possibly remapped
  score: number;
  fontSize: number;
  bold: boolean;
  y: number;
  lineHeight: number;
  bbox: BoundingBox;
  spacingScore?: number;
}

export type HeadingLevel = 'H1' | 'H2' | 'H3' | 'H4';

export const HEADING_LEVELS: readonly HeadingLevel[] = ['H1', 'H2', 'H3', 'H4'];

export interface OutlineEntry {
  level: HeadingLevel;
  text: string;         // trimmed, one trailing space
  page: number;
}

export interface DocumentStructure {
  title: string;
  outline: OutlineEntry[];
}

export type TitleSource = 'family' | 'layout' | 'metadata' | 'filename' | 'none';

export interface TitleResult {
  title: string;
  source: TitleSource;
}

export interface FontThresholds {
  h1: number;
  h2: number;
  h3: number;
  h4: number;
}

// ============================================================================
// Options
// ============================================================================

export interface TableDetectorOptions {
  rowTolerance?: number;        // max y0 difference inside one row
  alignTolerance?: number;      // max x0 difference for column alignment
  alignRatio?: number;          // share of a row's cells that must align
  lookahead?: number;           // rows inspected after a seed row
  paddingX?: number;
  paddingY?: number;
  headerKeywords?: readonly string[]; // single-cell rows folded into the table below
}

export interface ClassifierOptions {
  /** Treat generous whitespace around a line like boldness in the size fallback */
  spacingEmphasis?: boolean;
}

export interface ExtractorOptions extends ClassifierOptions {
  /** Overrides the selected profile's default acceptance threshold */
  defaultThreshold?: number;
  /** Skip lines that repeat the title taken from the page content */
  excludeTitleText?: boolean;
  tables?: TableDetectorOptions;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Full text of a line: span texts concatenated in order.
 */
export function lineText(line: Line): string {
  return line.spans.map(s => s.text).join('');
}

/**
 * Union of a non-empty list of boxes.
 */
export function unionBox(boxes: BoundingBox[]): BoundingBox {
  return {
    x0: Math.min(...boxes.map(b => b.x0)),
    y0: Math.min(...boxes.map(b => b.y0)),
    x1: Math.max(...boxes.map(b => b.x1)),
    y1: Math.max(...boxes.map(b => b.y1)),
  };
}

export function levelNumber(level: HeadingLevel): number {
  return HEADING_LEVELS.indexOf(level) + 1;
}

export function levelFromNumber(n: number): HeadingLevel {
  const clamped = Math.min(Math.max(Math.round(n), 1), HEADING_LEVELS.length);
  return HEADING_LEVELS[clamped - 1];
}
