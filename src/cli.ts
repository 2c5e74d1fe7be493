#!/usr/bin/env tsx
/**
 * docoutline command line
 *
 * Usage:
 *   docoutline extract [inputDir] [outputDir] --concurrency 4 --threshold 5
 *   docoutline collection collections/trip/config.json
 *   docoutline inspect report.pdf --pages 2
 *
 * Document failures are logged and never change the exit code. Only usage
 * errors and an unreadable collection config exit with 1.
 */

import { createProgram } from './program';
import { CollectionConfigError } from './errors';
import { logger } from './logger';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    if (err instanceof CollectionConfigError) {
      logger.error(err.message, { file: err.context.file });
      process.exitCode = 1;
      return;
    }
    logger.error('Command failed', {}, err);
  });
