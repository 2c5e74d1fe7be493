/**
 * Collection Mode
 *
 * Runs the outline engine over a named set of documents described by a
 * collection config and writes one combined section listing. Sections are
 * listed in document order, then reading order; nothing is ranked.
 *
 * Config layout (PDFs live in a `pdf/` directory beside the config):
 *
 * {
 *   "persona": { "role": "Travel Planner" },
 *   "job_to_be_done": { "task": "Plan a four-day trip" },
 *   "documents": [{ "filename": "guide.pdf", "title": "City Guide" }]
 * }
 */

import { readFile, stat, writeFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { ExtractorOptions, HeadingLevel } from './types';
import type { DocumentLoader } from './adapters/types';
import { loadPdf } from './adapters/pdfjs';
import { OutlineExtractor } from './extractor';
import {
  CollectionConfigError,
  OutputWriteError,
  describeError,
  missingInputWarning,
  type ExtractionWarning,
} from './errors';
import { logger } from './logger';

// ============================================================================
// Config
// ============================================================================

export const collectionConfigSchema = z.object({
  persona: z.object({ role: z.string() }).passthrough(),
  job_to_be_done: z.object({ task: z.string() }).passthrough(),
  documents: z.array(
    z.object({
      filename: z.string().min(1),
      title: z.string().optional(),
    })
  ),
});

export type CollectionConfig = z.infer<typeof collectionConfigSchema>;

export async function loadCollectionConfig(path: string): Promise<CollectionConfig> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new CollectionConfigError(`Cannot read collection config: ${describeError(err)}`, path, err);
  }

  const parsed = collectionConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new CollectionConfigError(`Invalid collection config: ${issues.join('; ')}`, path);
  }
  return parsed.data;
}

// ============================================================================
// Output
// ============================================================================

export interface CollectionSection {
  document: string;
  section_title: string;
  level: HeadingLevel;
  page_number: number;
}

export interface CollectionOutput {
  metadata: {
    persona: CollectionConfig['persona'];
    task: string;
    documents: string[];
    total_sections: number;
    timestamp: string;
  };
  sections: CollectionSection[];
  subsections: never[];
}

export interface CollectionResult {
  output: CollectionOutput;
  warnings: ExtractionWarning[];
  failed: { file: string; reason: string }[];
}

export interface CollectionOptions {
  loader?: DocumentLoader;
  /** Source of the output timestamp */
  clock?: () => Date;
  options?: ExtractorOptions;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Process every listed document and write the combined listing to
 * `outputPath`. Missing or unreadable documents are skipped.
 */
export async function processCollection(
  configPath: string,
  outputPath: string,
  collection: CollectionOptions = {}
): Promise<CollectionResult> {
  const config = await loadCollectionConfig(configPath);
  const loader = collection.loader ?? loadPdf;
  const clock = collection.clock ?? (() => new Date());
  const extractor = new OutlineExtractor(collection.options);
  const pdfDir = join(dirname(configPath), 'pdf');

  logger.info('Processing collection', {
    role: config.persona.role,
    task: config.job_to_be_done.task,
    documents: config.documents.length,
  });

  const sections: CollectionSection[] = [];
  const processed: string[] = [];
  const warnings: ExtractionWarning[] = [];
  const failed: CollectionResult['failed'] = [];

  for (const { filename } of config.documents) {
    const path = join(pdfDir, filename);
    if (!(await fileExists(path))) {
      const warning = missingInputWarning(filename);
      logger.warn(warning.message, { code: warning.code });
      warnings.push(warning);
      continue;
    }

    try {
      const structure = extractor.extract(await loader(path));
      for (const entry of structure.outline) {
        sections.push({
          document: filename,
          section_title: entry.text,
          level: entry.level,
          page_number: entry.page,
        });
      }
      processed.push(filename);
      logger.info(`Processed ${filename}`, { sections: structure.outline.length });
    } catch (err) {
      logger.error(`Failed to process ${filename}`, { file: filename }, err);
      failed.push({ file: filename, reason: describeError(err) });
    }
  }

  const output: CollectionOutput = {
    metadata: {
      persona: config.persona,
      task: config.job_to_be_done.task,
      documents: processed,
      total_sections: sections.length,
      timestamp: clock().toISOString(),
    },
    sections,
    subsections: [],
  };

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, JSON.stringify(output, null, 2), 'utf8');
  } catch (err) {
    throw new OutputWriteError(outputPath, err);
  }
  logger.info('Collection complete', {
    output: outputPath,
    documents: processed.length,
    sections: sections.length,
  });

  return { output, warnings, failed };
}
