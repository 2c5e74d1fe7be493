/**
 * Document Structure Assembly
 *
 * Orchestrates one extraction: select the profile, find the title, analyze
 * every page for heading candidates, then classify them into the outline.
 *
 * @example
 * const extractor = new OutlineExtractor();
 * const { title, outline } = extractor.extract(document);
 *
 * // From a PDF on disk
 * const structure = await extractFromFile('reports/annual.pdf');
 */

import type {
  DocumentStructure,
  ExtractorOptions,
  HeadingCandidate,
  LayoutDocument,
  Page,
  TableDetectorOptions,
  TitleResult,
} from './types';
import { lineText } from './types';
import { getDefaultCatalog, selectProfile, type DocumentProfile, type RuleCatalog } from './rules';
import { detectTableRegions, isInTableRegion } from './tables';
import { extractTitle } from './title';
import { computeSpacingScores, isAboveThreshold, scoreLine } from './scorer';
import { classifyHeadings } from './classifier';
import { isObviousHeading, isPartOfTitle, isTocEntry, isTocLabel, isTocPageEntry } from './patterns';
import { loadPdf } from './adapters/pdfjs';
import type { ExtractionWarning } from './errors';
import { logger } from './logger';

interface ResolvedExtractorOptions {
  defaultThreshold: number | undefined;
  excludeTitleText: boolean;
  spacingEmphasis: boolean;
  tables: TableDetectorOptions;
}

/**
 * Everything one extraction produced, including what was decided on the way.
 */
export interface ExtractionReport {
  structure: DocumentStructure;
  profile: string;
  titleSource: TitleResult['source'];
  candidates: HeadingCandidate[];
  warnings: ExtractionWarning[];
}

export class OutlineExtractor {
  private readonly options: ResolvedExtractorOptions;
  private readonly catalog: RuleCatalog;

  constructor(options: ExtractorOptions = {}, catalog: RuleCatalog = getDefaultCatalog()) {
    this.options = {
      defaultThreshold: options.defaultThreshold,
      excludeTitleText: options.excludeTitleText ?? true,
      spacingEmphasis: options.spacingEmphasis ?? false,
      tables: options.tables ?? {},
    };
    this.catalog = catalog;
  }

  selectProfile(document: LayoutDocument): DocumentProfile {
    return selectProfile(document, this.catalog.profiles, this.catalog.generic);
  }

  /**
   * Title and outline of one document. Warnings are logged.
   */
  extract(document: LayoutDocument): DocumentStructure {
    const report = this.analyze(document);
    for (const warning of report.warnings) {
      logger.warn(warning.message, { code: warning.code, file: warning.file });
    }
    return report.structure;
  }

  analyze(document: LayoutDocument): ExtractionReport {
    const profile = this.selectProfile(document);
    const title = extractTitle(document, profile);

    // Only titles read from the page content can repeat as heading lines
    const titleText =
      this.options.excludeTitleText && (title.source === 'family' || title.source === 'layout')
        ? title.title
        : '';

    const accepted = document.pages.flatMap(page => this.analyzePage(page, profile, titleText));
    const candidates = computeSpacingScores(accepted);
    const outline = classifyHeadings(candidates, profile, {
      spacingEmphasis: this.options.spacingEmphasis,
    });

    const warnings: ExtractionWarning[] = [];
    if (title.source === 'filename' || title.source === 'none') {
      warnings.push({
        code: 'TITLE_NOT_FOUND',
        message: `No title found in ${document.fileName}, using ${title.source}`,
        file: document.fileName,
      });
    }
    if (outline.length === 0) {
      warnings.push({
        code: 'NO_HEADINGS',
        message: `No headings found in ${document.fileName}`,
        file: document.fileName,
      });
    }

    logger.debug('Extracted outline', {
      file: document.fileName,
      profile: profile.name,
      titleSource: title.source,
      candidates: candidates.length,
      headings: outline.length,
    });

    return {
      structure: { title: title.title, outline },
      profile: profile.name,
      titleSource: title.source,
      candidates,
      warnings,
    };
  }

  /**
   * Accepted heading candidates of one page, in vertical order.
   */
  analyzePage(page: Page, profile: DocumentProfile, titleText = ''): HeadingCandidate[] {
    const regions = detectTableRegions(page, {
      ...this.options.tables,
      headerKeywords:
        this.options.tables.headerKeywords ?? profile.rules.words('tableHeaderKeywords'),
    });

    const lines = page.lines
      .filter(line => line.spans.length > 0)
      .map(line => ({ line, text: lineText(line).trim() }))
      .sort((a, b) => a.line.bbox.y0 - b.line.bbox.y0);

    const rules = profile.rules;
    const isTocPage = lines.some(({ text }) => isTocLabel(text, rules));
    const fallback = this.options.defaultThreshold ?? profile.defaultThreshold;
    const candidates: HeadingCandidate[] = [];

    for (const { line, text } of lines) {
      if (text.length < 3) continue;

      if (isInTableRegion(line.bbox, regions) && !isObviousHeading(text, rules)) continue;

      if (isTocPage ? isTocPageEntry(text, rules) : isTocEntry(text, rules)) continue;

      if (titleText && isPartOfTitle(text, titleText)) continue;

      const score = scoreLine(text, line.spans, profile);
      if (!isAboveThreshold(score, profile.threshold(text, fallback))) continue;

      const primary = line.spans[0];
      candidates.push({
        text,
        page: profile.remapPage(text, page.pageNumber),
        score,
        fontSize: primary.fontSize,
        bold: primary.bold,
        y: line.bbox.y0,
        lineHeight: line.bbox.y1 - line.bbox.y0,
        bbox: line.bbox,
      });
    }

    return candidates;
  }
}

/**
 * Functional form of {@link OutlineExtractor.extract}.
 */
export function extractOutline(document: LayoutDocument, options: ExtractorOptions = {}): DocumentStructure {
  return new OutlineExtractor(options).extract(document);
}

/**
 * Open a PDF and extract its structure. Throws DocumentOpenError when the
 * file cannot be read as a PDF.
 */
export async function extractFromFile(path: string, options: ExtractorOptions = {}): Promise<DocumentStructure> {
  const document = await loadPdf(path);
  return new OutlineExtractor(options).extract(document);
}
