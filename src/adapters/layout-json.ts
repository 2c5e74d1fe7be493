import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import type { BoundingBox, LayoutDocument, Line, Page } from '../types';
import { unionBox } from '../types';
import { DocumentOpenError, LayoutValidationError } from '../errors';

/**
 * Layout JSON adapter
 *
 * Reads a document that was already parsed elsewhere, serialized as:
 *
 * {
 *   "fileName": "report.pdf",
 *   "metadata": { "title": "..." },
 *   "pages": [{
 *     "number": 1, "width": 612, "height": 792,
 *     "lines": [{ "spans": [{ "text": "1. Introduction", "bbox": [72, 90, 220, 108],
 *                             "size": 18, "bold": true, "font": "Arial-Bold" }] }]
 *   }]
 * }
 *
 * Boxes are [x0, y0, x1, y1] with a top-left origin. A line's bbox is optional
 * and defaults to the union of its spans.
 */

const bboxSchema = z
  .tuple([z.number(), z.number(), z.number(), z.number()])
  .refine(([x0, y0, x1, y1]) => x1 >= x0 && y1 >= y0, 'bbox must satisfy x1 >= x0 and y1 >= y0');

const spanSchema = z.object({
  text: z.string(),
  bbox: bboxSchema,
  size: z.number().positive(),
  bold: z.boolean().default(false),
  italic: z.boolean().default(false),
  font: z.string().default(''),
});

const lineSchema = z.object({
  spans: z.array(spanSchema),
  bbox: bboxSchema.optional(),
});

const pageSchema = z.object({
  number: z.number().int().positive(),
  width: z.number().positive(),
  height: z.number().positive(),
  lines: z.array(lineSchema),
});

export const layoutDocumentSchema = z.object({
  fileName: z.string().min(1),
  metadata: z.object({ title: z.string().optional() }).default({}),
  pages: z.array(pageSchema),
});

export type LayoutJson = z.input<typeof layoutDocumentSchema>;

type ParsedLine = z.infer<typeof lineSchema>;
type ParsedPage = z.infer<typeof pageSchema>;

function toBox([x0, y0, x1, y1]: [number, number, number, number]): BoundingBox {
  return { x0, y0, x1, y1 };
}

function toLine(line: ParsedLine): Line {
  const spans = line.spans.map(span => ({
    text: span.text,
    bbox: toBox(span.bbox),
    fontSize: span.size,
    bold: span.bold,
    italic: span.italic,
    fontName: span.font,
  }));
  const bbox = line.bbox
    ? toBox(line.bbox)
    : spans.length > 0
      ? unionBox(spans.map(s => s.bbox))
      : { x0: 0, y0: 0, x1: 0, y1: 0 };
  return { spans, bbox };
}

function toPage(page: ParsedPage): Page {
  return {
    pageNumber: page.number,
    width: page.width,
    height: page.height,
    lines: page.lines.map(toLine),
  };
}

/**
 * Validate a serialized layout and convert it to a LayoutDocument.
 */
export function parseLayoutDocument(json: unknown, source?: string): LayoutDocument {
  const parsed = layoutDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new LayoutValidationError(issues, source ? { file: source } : {});
  }

  const { fileName, metadata, pages } = parsed.data;
  return {
    fileName,
    metadata: metadata.title !== undefined ? { title: metadata.title } : {},
    pages: pages.map(toPage),
  };
}

/**
 * Read a layout JSON file from disk.
 */
export async function loadLayoutFile(path: string): Promise<LayoutDocument> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new DocumentOpenError(basename(path), err);
  }
  return parseLayoutDocument(json, basename(path));
}
