/**
 * Title Extraction
 *
 * Strategies run in order and the first non-empty result wins:
 *   1. Family search   - profile title patterns on the first pages
 *   2. Layout scoring  - prominent lines in the top of page 1
 *   3. Metadata        - the document's Title property
 *   4. Filename        - the file name without extension
 */

import { parse } from 'node:path';
import type { LayoutDocument, Page, StyledSpan, TitleResult } from './types';
import { lineText } from './types';
import { getDefaultCatalog, type DocumentProfile, type RuleSet } from './rules';
import { startsUpper, words } from './patterns';

/** Pages scanned by the family search */
const FAMILY_SEARCH_PAGES = 5;
/** Share of page 1, from the top, searched for layout titles */
const TITLE_AREA = 0.6;
/** Max vertical distance between lines merged into one title */
const MERGE_DISTANCE = 100;

// ============================================================================
// Shape Heuristics
// ============================================================================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Title case (small words aside) or a document-type keyword.
 */
export function looksLikeTitle(text: string, rules: RuleSet): boolean {
  const list = words(text);
  if (list.length >= 2) {
    let conforming = 0;
    list.forEach((word, i) => {
      const small = rules.hasWord('titleSmallWords', word);
      if (!small || i === 0) {
        if (startsUpper(word)) conforming++;
      } else if (!startsUpper(word)) {
        conforming++;
      }
    });
    if (conforming >= list.length * 0.7) return true;
  }

  return rules
    .words('documentTypeKeywords')
    .some(keyword => new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i').test(text));
}

/**
 * Known title phrasings ("request for proposal", "user manual") or a
 * title-like shape.
 */
export function looksLikeDocumentTitle(text: string, rules: RuleSet): boolean {
  return rules.test('titleShape', text) || looksLikeTitle(text, rules);
}

export function isNonTitle(text: string, rules: RuleSet): boolean {
  const t = text.trim();
  if (t.length < 5 || t.length > 500) return true;
  return rules.test('titleExclude', t);
}

/**
 * Whitespace collapsed, trailing punctuation and leading labels removed.
 */
export function cleanTitle(title: string): string {
  return title
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/[.,:;]+$/, '')
    .replace(/^(title:|subject:|document:|file:)\s*/i, '')
    .trim();
}

// ============================================================================
// Layout Scoring
// ============================================================================

function positionScore(y: number, pageHeight: number): number {
  if (y < pageHeight * 0.15) return 6;
  if (y < pageHeight * 0.25) return 4;
  if (y < pageHeight * 0.4) return 2;
  if (y < pageHeight * 0.6) return 1;
  return 0;
}

function fontScore(avgSize: number): number {
  if (avgSize > 20) return 6;
  if (avgSize > 18) return 5;
  if (avgSize > 16) return 4;
  if (avgSize > 14) return 3;
  if (avgSize > 12) return 2;
  if (avgSize > 10) return 1;
  return 0;
}

function lengthScore(length: number): number {
  if (length >= 15 && length <= 150) return 3;
  if (length >= 10 && length <= 200) return 2;
  if (length >= 5 && length <= 300) return 1;
  return 0;
}

/**
 * Score a (possibly merged) line as the document title. Never negative.
 */
export function scoreTitleCandidate(
  text: string,
  spans: StyledSpan[],
  pageHeight: number,
  profile: DocumentProfile
): number {
  const rules = profile.rules;
  if (spans.length === 0 || text.length < 5 || isNonTitle(text, rules)) return 0;

  let score = positionScore(spans[0].bbox.y0, pageHeight);

  const avgSize = spans.reduce((sum, s) => sum + s.fontSize, 0) / spans.length;
  score += fontScore(avgSize);

  if (spans.some(s => s.bold)) score += 3;
  score += lengthScore(text.length);

  if (looksLikeDocumentTitle(text, rules)) score += 4;
  if (profile.matchesTitlePattern(text)) score += 5;

  if (/^\d+\.\s*$|^page\s+\d+|copyright|©/i.test(text)) score -= 3;

  return Math.max(0, score);
}

interface TitleLine {
  text: string;
  spans: StyledSpan[];
  y: number;
}

export interface TitleCandidate {
  text: string;
  score: number;
}

function titleLines(page: Page): TitleLine[] {
  return page.lines
    .filter(line => line.spans.length > 0)
    .map(line => ({ text: lineText(line).trim(), spans: line.spans, y: line.spans[0].bbox.y0 }))
    .filter(line => line.text.length >= 3)
    .sort((a, b) => a.y - b.y);
}

/**
 * Single lines plus two- and three-line combinations from the top of the page.
 */
export function findTitleCandidates(page: Page, profile: DocumentProfile): TitleCandidate[] {
  const top = titleLines(page).filter(line => line.y < page.height * TITLE_AREA);
  const candidates: TitleCandidate[] = [];

  const score = (parts: TitleLine[]): TitleCandidate => {
    const text = parts.map(p => p.text).join(' ').trim();
    const spans = parts.flatMap(p => p.spans);
    return { text, score: scoreTitleCandidate(text, spans, page.height, profile) };
  };

  top.forEach((line, i) => {
    const single = score([line]);
    if (single.score > 0) candidates.push(single);

    const next = top[i + 1];
    if (next && Math.abs(next.y - line.y) < MERGE_DISTANCE) {
      candidates.push(score([line, next]));

      const third = top[i + 2];
      if (third && Math.abs(third.y - next.y) < MERGE_DISTANCE) {
        candidates.push(score([line, next, third]));
      }
    }
  });

  return candidates;
}

// ============================================================================
// Strategies
// ============================================================================

function fromFamily(document: LayoutDocument, profile: DocumentProfile): string {
  for (const page of document.pages.slice(0, FAMILY_SEARCH_PAGES)) {
    for (const line of page.lines) {
      const text = lineText(line).trim();
      const first = line.spans[0];
      if (!first || !profile.matchesTitlePattern(text)) continue;
      if (first.fontSize >= 14 && first.bold) {
        return profile.rewriteTitle(text) ?? cleanTitle(text);
      }
    }
  }
  return '';
}

function fromLayout(document: LayoutDocument, profile: DocumentProfile): string {
  const page = document.pages[0];
  if (!page) return '';

  const candidates = findTitleCandidates(page, profile);

  const family = candidates.find(c => profile.matchesTitlePattern(c.text));
  if (family) {
    const title = profile.rewriteTitle(family.text) ?? cleanTitle(family.text);
    if (title) return title;
  }

  const minScore = profile.rules.settings.minTitleScore;
  let best: TitleCandidate | undefined;
  for (const candidate of candidates) {
    if (candidate.score <= minScore) continue;
    if (!best || candidate.score > best.score) best = candidate;
  }

  return best ? cleanTitle(best.text) : '';
}

/**
 * The stored Title property, unless it is generic or names a file.
 */
export function titleFromMetadata(document: LayoutDocument): string {
  const title = document.metadata.title?.trim() ?? '';
  if (title.length <= 3) return '';
  if (/\.(doc|pdf|txt|cdr)$|microsoft\s+word/i.test(title)) return '';
  if (/^(document|file|untitled)/i.test(title)) return '';
  return title;
}

export function titleFromFileName(fileName: string): string {
  return parse(fileName).name;
}

/**
 * Best-guess title of a document, with the strategy that produced it.
 */
export function extractTitle(
  document: LayoutDocument,
  profile: DocumentProfile = getDefaultCatalog().generic
): TitleResult {
  if (profile.suppressTitle) return { title: '', source: 'none' };

  const family = fromFamily(document, profile);
  if (family) return { title: family, source: 'family' };

  const layout = fromLayout(document, profile);
  if (layout) return { title: layout, source: 'layout' };

  const metadata = titleFromMetadata(document);
  if (metadata) return { title: metadata, source: 'metadata' };

  const stem = titleFromFileName(document.fileName);
  return stem ? { title: stem, source: 'filename' } : { title: '', source: 'none' };
}
