/**
 * Batch Mode
 *
 * Every PDF in an input directory becomes one `<stem>.json` outline in the
 * output directory. A document that fails is logged and reported; the rest
 * of the batch carries on.
 *
 * @example
 * const report = await runBatch({ inputDir: 'input', outputDir: 'output' });
 * console.log(`${report.succeeded}/${report.total} documents`);
 */

import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { join, parse } from 'node:path';
import type { DocumentStructure, ExtractorOptions } from './types';
import type { DocumentLoader } from './adapters/types';
import { loadPdf } from './adapters/pdfjs';
import { OutlineExtractor } from './extractor';
import { OutputWriteError, describeError } from './errors';
import { logger } from './logger';

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  /** Opens one document; defaults to the pdf.js loader */
  loader?: DocumentLoader;
  /** Documents processed at the same time */
  concurrency?: number;
  options?: ExtractorOptions;
}

export type BatchFileResult =
  | { file: string; ok: true; output: string; title: string; headings: number }
  | { file: string; ok: false; reason: string };

export interface BatchReport {
  total: number;
  succeeded: number;
  failed: number;
  files: BatchFileResult[];
}

/** Serialized outline, 2-space indented. */
export function formatStructure(structure: DocumentStructure): string {
  return JSON.stringify({ title: structure.title, outline: structure.outline }, null, 2);
}

/**
 * PDF file names in a directory, sorted. The directory is created when it
 * does not exist.
 */
export async function listPdfFiles(dir: string): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && /\.pdf$/i.test(entry.name))
    .map(entry => entry.name)
    .sort();
}

/**
 * Run `task` over `items` with at most `limit` in flight. Results keep the
 * order of `items`.
 */
async function mapWithLimit<T, R>(items: T[], limit: number, task: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index]);
    }
  };

  const slots = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: slots }, worker));
  return results;
}

export async function runBatch(batch: BatchOptions): Promise<BatchReport> {
  const { inputDir, outputDir } = batch;
  const loader = batch.loader ?? loadPdf;
  const extractor = new OutlineExtractor(batch.options);

  const files = await listPdfFiles(inputDir);
  await mkdir(outputDir, { recursive: true });

  if (files.length === 0) {
    logger.warn('No PDF files found', { inputDir });
    return { total: 0, succeeded: 0, failed: 0, files: [] };
  }

  logger.info(`Processing ${files.length} PDF file(s)`, { inputDir, outputDir });

  const processFile = async (file: string): Promise<BatchFileResult> => {
    const started = Date.now();
    try {
      const document = await loader(join(inputDir, file));
      const structure = extractor.extract(document);
      const output = join(outputDir, `${parse(file).name}.json`);
      await writeFile(output, formatStructure(structure), 'utf8').catch((err: unknown) => {
        throw new OutputWriteError(output, err);
      });

      logger.info(`Processed ${file}`, {
        headings: structure.outline.length,
        ms: Date.now() - started,
      });
      return { file, ok: true, output, title: structure.title, headings: structure.outline.length };
    } catch (err) {
      logger.error(`Failed to process ${file}`, { file }, err);
      return { file, ok: false, reason: describeError(err) };
    }
  };

  const results = await mapWithLimit(files, batch.concurrency ?? 1, processFile);
  const succeeded = results.filter(r => r.ok).length;

  logger.info('Batch complete', { succeeded, failed: results.length - succeeded });

  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    files: results,
  };
}
