/**
 * Heading Candidate Scoring
 *
 * A line is scored in two phases. Exclusion checks run first and any hit
 * returns 0; only lines that pass every check reach the additive scoring.
 *
 * @example
 * const score = scoreLine('2.1 Intended Audience', line.spans, profile);
 * if (isAboveThreshold(score, profile.threshold(text))) { ... }
 */

import type { HeadingCandidate, StyledSpan } from './types';
import { getDefaultCatalog, type DocumentProfile } from './rules';
import {
  hasDanglingEnding,
  isAcademicHeading,
  isAllCaps,
  isAuthorOrMetadata,
  isBracketed,
  isCodeSnippet,
  isNumberedSection,
  isNumberedSubsection,
  isObviousNonHeading,
  isSentenceFragment,
  isStandaloneHeadingLine,
  isUniversalMetadata,
  looksLikeProperHeading,
  words,
} from './patterns';

const MIN_LENGTH = 3;
const MAX_LENGTH = 80;
/** Left-margin zone in page units */
const LEFT_MARGIN = 100;

const HEADING_PREFIXES = [
  /^\d+\.?\s+/,
  /^[A-Z][A-Z\s]{2,}$/,
  /^\d+\.\d+\.?\s+/,
  /^\d+\.\d+\.\d+\.?\s+/,
];

const WEIGHT_HINTS = ['bold', 'heavy', 'black', 'extra'];
const SERIF_HINTS = ['times', 'serif', 'georgia'];
const SANS_HINTS = ['arial', 'helvetica', 'sans'];

// ============================================================================
// Exclusions
// ============================================================================

/**
 * Reason a line can never be a heading, or null when it may be one.
 */
export function exclusionReason(text: string, profile: DocumentProfile): string | null {
  const rules = profile.rules;
  const mustKeep = rules.test('mustKeep', text);
  const lower = text.toLowerCase();

  if (!mustKeep && rules.test('exclude', text)) return 'excluded-shape';

  if (isBracketed(text)) return 'bracketed';
  if (rules.hasWord('strictNonHeadings', lower)) return 'strict-non-heading';
  if (!mustKeep && rules.hasWord('commonNonHeadings', lower)) return 'common-non-heading';
  if (isObviousNonHeading(text, rules)) return 'boilerplate';
  if (!mustKeep && isCodeSnippet(text, rules)) return 'code-or-callout';
  if (isAuthorOrMetadata(text, rules)) return 'author-or-metadata';
  if (isUniversalMetadata(text, rules)) return 'metadata';

  if (text.length < MIN_LENGTH) return 'too-short';
  if (text.length > MAX_LENGTH && !rules.test('longAllowed', text)) return 'too-long';

  if (mustKeep) return null;

  if (hasDanglingEnding(text, rules)) return 'dangling-ending';
  if (isSentenceFragment(text, rules)) return 'fragment';
  if (text.length < 5 && !/^\d+\.?\s*$/.test(text)) return 'too-short';

  return null;
}

// ============================================================================
// Positive Scoring
// ============================================================================

export function fontSizeScore(size: number): number {
  if (size > 20) return 5;
  if (size > 18) return 4;
  if (size > 16) return 3;
  if (size > 14) return 2;
  if (size > 12) return 1;
  if (size > 10) return 0.5;
  return 0;
}

/**
 * Weight, slant and family of the line's first span.
 */
export function formattingScore(span: StyledSpan, text: string): number {
  let score = 0;
  const fontName = span.fontName.toLowerCase();

  if (span.bold) score += words(text).length > 1 ? 3 : 1;
  if (WEIGHT_HINTS.some(w => fontName.includes(w))) score += 2;
  if (span.italic) score -= 0.5;

  if (SERIF_HINTS.some(f => fontName.includes(f))) score += 0.5;
  else if (SANS_HINTS.some(f => fontName.includes(f))) score += 1;

  if (isAllCaps(text) && text.length > 3) score += 1;

  return score;
}

function lengthScore(length: number): number {
  if (length >= 10 && length <= MAX_LENGTH) return 2;
  if (length <= 120) return 1;
  return -2;
}

function penalties(text: string): number {
  let score = 0;
  if (text.length > 150) score -= 3;
  if (/\.\s+[A-Z]/.test(text)) score -= 2;
  if (/[,;-]$/.test(text)) score -= 2;
  return score;
}

/**
 * Heuristic heading score of one line. 0 when the line is excluded.
 */
export function scoreLine(
  rawText: string,
  spans: StyledSpan[],
  profile: DocumentProfile = getDefaultCatalog().generic
): number {
  const text = rawText.trim();
  const primary = spans[0];
  if (!primary || !text) return 0;
  if (exclusionReason(text, profile) !== null) return 0;

  const rules = profile.rules;
  let score = fontSizeScore(primary.fontSize);

  if (rules.test('structured', text)) score += 4;

  if (isNumberedSection(text)) score += 3;
  else if (isNumberedSubsection(text)) score += 2;

  score += formattingScore(primary, text);

  if (HEADING_PREFIXES.some(p => p.test(text))) score += 3;
  if (primary.bbox.x0 < LEFT_MARGIN) score += 1;

  score += lengthScore(text.length);
  if (isAllCaps(text) && text.length > 8 && words(text).length > 1) score += 1;

  score += penalties(text);

  if (looksLikeProperHeading(text, rules)) score += 2;
  if (isAcademicHeading(text, rules)) score += 1.5;
  if (isStandaloneHeadingLine(text)) score += 1;

  return score;
}

/**
 * Acceptance is strict: a score equal to the threshold is rejected.
 */
export function isAboveThreshold(score: number, threshold: number): boolean {
  return score > threshold;
}

// ============================================================================
// Spacing
// ============================================================================

function gapScore(gap: number, lineHeight: number): number {
  if (gap > lineHeight * 1.5) return 2;
  if (gap > lineHeight) return 1;
  return 0;
}

/**
 * Whitespace above and below each candidate, measured against its
 * neighbours on the same page. Returns new candidates; input order is kept.
 */
export function computeSpacingScores(candidates: HeadingCandidate[]): HeadingCandidate[] {
  const byPage = new Map<number, HeadingCandidate[]>();
  for (const candidate of candidates) {
    const list = byPage.get(candidate.page) ?? [];
    list.push(candidate);
    byPage.set(candidate.page, list);
  }

  const scores = new Map<HeadingCandidate, number>();
  for (const list of byPage.values()) {
    const sorted = [...list].sort((a, b) => a.y - b.y);
    sorted.forEach((current, i) => {
      let score = 0;
      const prev = sorted[i - 1];
      const next = sorted[i + 1];
      if (prev) score += gapScore(current.y - (prev.y + prev.lineHeight), current.lineHeight);
      if (next) score += gapScore(next.y - (current.y + current.lineHeight), current.lineHeight);
      scores.set(current, score);
    });
  }

  return candidates.map(c => ({ ...c, spacingScore: scores.get(c) ?? 0 }));
}
