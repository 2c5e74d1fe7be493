/**
 * Command definitions for the docoutline CLI.
 */

import { dirname, join } from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { runBatch } from './batch';
import { processCollection } from './collection';
import { formatFontReport, inspectDocument } from './inspect';
import { loadPdf } from './adapters/pdfjs';
import { loadLayoutFile } from './adapters/layout-json';
import { setLogLevel, type LogLevel } from './logger';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

interface ProgramOptions {
  logLevel?: string;
}

interface ExtractCommandOptions {
  concurrency?: number;
  threshold?: number;
}

interface CollectionCommandOptions {
  threshold?: number;
}

interface InspectCommandOptions {
  pages: number;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Not a positive integer.');
  return n;
}

/**
 * The docoutline command tree. Parsing is left to the caller.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('docoutline')
    .description('Extract the title and H1-H4 outline of text-layer PDFs')
    .addOption(new Option('--log-level <level>', 'minimum log level').choices(LOG_LEVELS))
    .hook('preAction', thisCommand => {
      const { logLevel } = thisCommand.opts<ProgramOptions>();
      const level = LOG_LEVELS.find(l => l === logLevel);
      if (level) setLogLevel(level);
    });

  program
    .command('extract')
    .description('Write one <name>.json outline per PDF in a directory')
    .argument('[inputDir]', 'directory of PDF files', 'input')
    .argument('[outputDir]', 'directory for JSON outlines', 'output')
    .option('-c, --concurrency <n>', 'documents processed at the same time', parsePositiveInt)
    .option('-t, --threshold <score>', 'default acceptance threshold', parseNumber)
    .action(async (inputDir: string, outputDir: string, opts: ExtractCommandOptions) => {
      const report = await runBatch({
        inputDir,
        outputDir,
        concurrency: opts.concurrency,
        options: { defaultThreshold: opts.threshold },
      });
      console.log(`${report.succeeded}/${report.total} documents processed`);
    });

  program
    .command('collection')
    .description('List the sections of every document in a collection config')
    .argument('<config>', 'collection config JSON; PDFs are read from pdf/ beside it')
    .argument('[output]', 'output JSON (default: collection_output.json beside the config)')
    .option('-t, --threshold <score>', 'default acceptance threshold', parseNumber)
    .action(async (configPath: string, outputPath: string | undefined, opts: CollectionCommandOptions) => {
      const target = outputPath ?? join(dirname(configPath), 'collection_output.json');
      const { output } = await processCollection(configPath, target, {
        options: { defaultThreshold: opts.threshold },
      });
      console.log(`${output.metadata.total_sections} sections from ${output.metadata.documents.length} documents`);
    });

  program
    .command('inspect')
    .description('Print the font sizes and largest lines of the first pages')
    .argument('<file>', 'PDF or layout JSON file')
    .option('-p, --pages <n>', 'pages to report', parsePositiveInt, 5)
    .action(async (file: string, opts: InspectCommandOptions) => {
      const document = /\.json$/i.test(file) ? await loadLayoutFile(file) : await loadPdf(file);
      console.log(formatFontReport(inspectDocument(document, { pages: opts.pages })));
    });

  return program;
}
