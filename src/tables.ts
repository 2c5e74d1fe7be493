/**
 * Table Region Detection
 *
 * Finds tabular areas on a page from span geometry alone, so that cell text
 * is not mistaken for headings.
 *
 * @example
 * const regions = detectTableRegions(page);
 * const inTable = isInTableRegion(line.bbox, regions);
 */

import type { BoundingBox, Page, StyledSpan, TableDetectorOptions, TableRegion } from './types';
import { getDefaultRules } from './rules';

type ResolvedTableOptions = Required<TableDetectorOptions>;

const DEFAULT_OPTIONS: Omit<ResolvedTableOptions, 'headerKeywords'> = {
  rowTolerance: 5,
  alignTolerance: 30,
  alignRatio: 0.5,
  lookahead: 10,
  paddingX: 10,
  paddingY: 5,
};

function resolveOptions(options: TableDetectorOptions): ResolvedTableOptions {
  return {
    rowTolerance: options.rowTolerance ?? DEFAULT_OPTIONS.rowTolerance,
    alignTolerance: options.alignTolerance ?? DEFAULT_OPTIONS.alignTolerance,
    alignRatio: options.alignRatio ?? DEFAULT_OPTIONS.alignRatio,
    lookahead: options.lookahead ?? DEFAULT_OPTIONS.lookahead,
    paddingX: options.paddingX ?? DEFAULT_OPTIONS.paddingX,
    paddingY: options.paddingY ?? DEFAULT_OPTIONS.paddingY,
    headerKeywords: options.headerKeywords ?? getDefaultRules().words('tableHeaderKeywords'),
  };
}

// ============================================================================
// Rows
// ============================================================================

interface Cell {
  text: string;
  bbox: BoundingBox;
}

type Row = Cell[];

/**
 * Group non-empty spans into rows by top edge. A span joins the current row
 * when its y0 is within `tolerance` of the row's first span.
 */
export function groupRows(spans: StyledSpan[], tolerance = DEFAULT_OPTIONS.rowTolerance): Row[] {
  const cells = spans
    .filter(s => s.text.trim().length > 0)
    .map(s => ({ text: s.text.trim(), bbox: s.bbox }))
    .sort((a, b) => a.bbox.y0 - b.bbox.y0);

  const rows: Row[] = [];
  let current: Row = [];
  let anchorY = 0;

  for (const cell of cells) {
    if (current.length > 0 && Math.abs(cell.bbox.y0 - anchorY) <= tolerance) {
      current.push(cell);
      continue;
    }
    if (current.length > 0) rows.push(current);
    current = [cell];
    anchorY = cell.bbox.y0;
  }
  if (current.length > 0) rows.push(current);

  for (const row of rows) row.sort((a, b) => a.bbox.x0 - b.bbox.x0);
  return rows;
}

function rowsAlign(seed: Row, row: Row, opts: ResolvedTableOptions): boolean {
  const seedX = seed.map(c => c.bbox.x0);
  const aligned = row.filter(c => seedX.some(x => Math.abs(c.bbox.x0 - x) <= opts.alignTolerance));
  return aligned.length >= row.length * opts.alignRatio;
}

/**
 * Grow a table from a multi-column seed row. Single-cell rows in between are
 * skipped; the first multi-column row that does not align ends the table.
 */
function regionFromSeed(rows: Row[], start: number, opts: ResolvedTableOptions): TableRegion | null {
  const seed = rows[start];
  if (!seed || seed.length < 2) return null;

  const included: Row[] = [seed];
  const end = Math.min(start + opts.lookahead, rows.length);
  for (let i = start + 1; i < end; i++) {
    const row = rows[i];
    if (row.length < 2) continue;
    if (!rowsAlign(seed, row, opts)) break;
    included.push(row);
  }

  if (included.length < 2) return null;

  const boxes = included.flat().map(c => c.bbox);
  return {
    x1: Math.min(...boxes.map(b => b.x0)) - opts.paddingX,
    y1: Math.min(...boxes.map(b => b.y0)) - opts.paddingY,
    x2: Math.max(...boxes.map(b => b.x1)) + opts.paddingX,
    y2: Math.max(...boxes.map(b => b.y1)) + opts.paddingY,
  };
}

// ============================================================================
// Regions
// ============================================================================

export function regionsOverlap(a: TableRegion, b: TableRegion): boolean {
  return !(a.x2 < b.x1 || b.x2 < a.x1 || a.y2 < b.y1 || b.y2 < a.y1);
}

function mergeOnce(regions: TableRegion[]): TableRegion[] {
  const merged: TableRegion[] = [];
  for (const region of regions) {
    const index = merged.findIndex(existing => regionsOverlap(region, existing));
    if (index === -1) {
      merged.push({ ...region });
      continue;
    }
    const existing = merged[index];
    merged[index] = {
      x1: Math.min(region.x1, existing.x1),
      y1: Math.min(region.y1, existing.y1),
      x2: Math.max(region.x2, existing.x2),
      y2: Math.max(region.y2, existing.y2),
    };
  }
  return merged;
}

/**
 * Merge until no two regions overlap. A union can start to overlap a region
 * that was kept separate earlier in the same pass, hence the loop.
 */
export function mergeOverlappingRegions(regions: TableRegion[]): TableRegion[] {
  let current = regions;
  for (;;) {
    const next = mergeOnce(current);
    if (next.length === current.length) return next;
    current = next;
  }
}

/**
 * Detect table regions on one page.
 */
export function detectTableRegions(page: Page, options: TableDetectorOptions = {}): TableRegion[] {
  const opts = resolveOptions(options);
  const rows = groupRows(page.lines.flatMap(line => line.spans), opts.rowTolerance);
  if (rows.length === 0) return [];

  const regions: TableRegion[] = [];

  rows.forEach((row, i) => {
    if (row.length < 2) return;
    const region = regionFromSeed(rows, i, opts);
    if (region) regions.push(region);
  });

  // Header rows: a single keyword cell directly above a multi-column row
  const keywords = opts.headerKeywords.map(k => k.toLowerCase());
  for (let i = 0; i < rows.length - 1; i++) {
    const row = rows[i];
    if (row.length !== 1 || rows[i + 1].length < 2) continue;

    const header = row[0];
    const text = header.text.toLowerCase();
    if (!keywords.some(k => text.includes(k))) continue;

    const region = regionFromSeed(rows, i + 1, opts);
    if (region) {
      region.y1 = Math.min(region.y1, header.bbox.y0 - opts.paddingY);
      regions.push(region);
    }
  }

  return mergeOverlappingRegions(regions);
}

/**
 * Full containment of a box in any region.
 */
export function isInTableRegion(bbox: BoundingBox, regions: TableRegion[]): boolean {
  return regions.some(
    r => bbox.x0 >= r.x1 && bbox.x1 <= r.x2 && bbox.y0 >= r.y1 && bbox.y1 <= r.y2
  );
}
