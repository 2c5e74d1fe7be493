/**
 * Document Outline Extraction
 *
 * Title and H1-H4 heading outline of a text-layer PDF, read from font
 * size, weight and page layout alone.
 *
 * Structure: Document → Page[] → Line[] → Span[]
 *
 * @example
 * const { title, outline } = await extractFromFile('input/report.pdf');
 *
 * // Already-parsed layout
 * const document = parseLayoutDocument(json);
 * const structure = new OutlineExtractor({ defaultThreshold: 5 }).extract(document);
 */

// Types
export type {
  BoundingBox,
  StyledSpan,
  Line,
  Page,
  DocumentMetadata,
  LayoutDocument,
  TableRegion,
  HeadingCandidate,
  HeadingLevel,
  OutlineEntry,
  DocumentStructure,
  TitleSource,
  TitleResult,
  FontThresholds,
  TableDetectorOptions,
  ClassifierOptions,
  ExtractorOptions,
} from './types';
export { HEADING_LEVELS, lineText, unionBox, levelNumber, levelFromNumber } from './types';

// Extraction
export { OutlineExtractor, extractOutline, extractFromFile } from './extractor';
export type { ExtractionReport } from './extractor';

// Pipeline stages
export { detectTableRegions, isInTableRegion, mergeOverlappingRegions } from './tables';
export { extractTitle, cleanTitle, findTitleCandidates } from './title';
export { scoreLine, exclusionReason, isAboveThreshold, computeSpacingScores } from './scorer';
export {
  classifyHeadings,
  computeFontThresholds,
  determineLevel,
  repairHierarchy,
  removeDuplicates,
} from './classifier';
export type { LevelInput } from './classifier';

// Rules and profiles
export {
  loadRuleCatalog,
  getDefaultCatalog,
  getDefaultRules,
  RuleSet,
  RuleProfile,
  selectProfile,
  RULE_ACTIONS,
} from './rules';
export type { RuleCatalog, DocumentProfile, RuleAction, RuleConfig, RuleFile, ProfileConfig } from './rules';

// Source adapters (PDF or layout JSON → LayoutDocument)
export { loadPdf, parsePdf, fromPdfJsPage, parseLayoutDocument, loadLayoutFile } from './adapters';
export type { DocumentLoader, PdfJsPageContent, PdfJsTextItem, LayoutJson } from './adapters';

// Batch and collection modes
export { runBatch, formatStructure } from './batch';
export type { BatchOptions, BatchReport, BatchFileResult } from './batch';
export { processCollection, loadCollectionConfig } from './collection';
export type { CollectionConfig, CollectionOutput, CollectionSection, CollectionResult } from './collection';

// Diagnostics
export { inspectDocument, formatFontReport } from './inspect';
export type { FontReport, PageFontReport } from './inspect';

// Errors and logging
export {
  OutlineError,
  DocumentOpenError,
  LayoutValidationError,
  RuleConfigError,
  CollectionConfigError,
  OutputWriteError,
  ErrorCode,
  isOutlineError,
} from './errors';
export type { ExtractionWarning, WarningCode, SerializedError } from './errors';
export { logger, setLogLevel } from './logger';
export type { LogLevel } from './logger';
