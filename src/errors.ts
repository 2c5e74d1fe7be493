/**
 * Error types for outline extraction.
 *
 * Fatal conditions are thrown as OutlineError subclasses. Non-fatal
 * conditions (no title found, no headings, a listed file missing) are
 * reported as ExtractionWarning records and logged, never thrown.
 */

export enum ErrorCode {
  // Input errors (1xxx)
  DOCUMENT_OPEN_FAILED = 1001,
  LAYOUT_INVALID = 1003,

  // Configuration errors (2xxx)
  RULES_INVALID = 2001,
  COLLECTION_CONFIG_INVALID = 2002,

  // Output errors (3xxx)
  OUTPUT_WRITE_FAILED = 3001,

  UNKNOWN = 9999,
}

export interface ErrorContext {
  operation: string;
  file?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
}

export class OutlineError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OutlineError';
    this.code = code;
    this.context = {
      ...context,
      operation: context.operation || 'unknown',
    };
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * The input cannot be parsed as a PDF (corrupt, wrong format, I/O failure).
 * Fatal for that document only.
 */
export class DocumentOpenError extends OutlineError {
  constructor(file: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cannot open document ${file}${detail}`, ErrorCode.DOCUMENT_OPEN_FAILED, {
      operation: 'openDocument',
      file,
    }, { cause });
    this.name = 'DocumentOpenError';
  }
}

/**
 * A serialized layout document failed validation.
 */
export class LayoutValidationError extends OutlineError {
  public readonly issues: string[];

  constructor(issues: string[], context: Partial<ErrorContext> = {}) {
    super(`Invalid layout document: ${issues.join('; ')}`, ErrorCode.LAYOUT_INVALID, {
      operation: 'loadLayout',
      ...context,
    });
    this.name = 'LayoutValidationError';
    this.issues = issues;
  }
}

export class RuleConfigError extends OutlineError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, ErrorCode.RULES_INVALID, { operation: 'loadRules', ...context });
    this.name = 'RuleConfigError';
  }
}

export class CollectionConfigError extends OutlineError {
  constructor(message: string, file: string, cause?: unknown) {
    super(message, ErrorCode.COLLECTION_CONFIG_INVALID, {
      operation: 'loadCollection',
      file,
    }, { cause });
    this.name = 'CollectionConfigError';
  }
}

/**
 * An outline or listing could not be written.
 */
export class OutputWriteError extends OutlineError {
  constructor(file: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cannot write ${file}${detail}`, ErrorCode.OUTPUT_WRITE_FAILED, {
      operation: 'writeOutput',
      file,
    }, { cause });
    this.name = 'OutputWriteError';
  }
}

// ============================================================================
// Warnings
// ============================================================================

export type WarningCode = 'TITLE_NOT_FOUND' | 'NO_HEADINGS' | 'MISSING_INPUT';

export interface ExtractionWarning {
  code: WarningCode;
  message: string;
  file: string;
}

export function missingInputWarning(file: string): ExtractionWarning {
  return {
    code: 'MISSING_INPUT',
    message: `${file} not found, skipping`,
    file,
  };
}

export function isOutlineError(error: unknown): error is OutlineError {
  return error instanceof OutlineError;
}

/**
 * Human-readable reason for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'An unknown error occurred';
}
