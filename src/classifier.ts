/**
 * Heading Level Classification
 *
 * Turns accepted candidates into the final outline. Each candidate moves
 * through Scored -> Leveled -> Kept -> Final, or drops out as Excluded or
 * Duplicate. Reading order is fixed by the first sort and never changes.
 */

import type {
  ClassifierOptions,
  FontThresholds,
  HeadingCandidate,
  HeadingLevel,
  OutlineEntry,
} from './types';
import { HEADING_LEVELS, levelFromNumber, levelNumber } from './types';
import { getDefaultCatalog, type DocumentProfile } from './rules';
import { normalizeText, shouldExcludeHeading } from './patterns';

const FALLBACK_THRESHOLDS: FontThresholds = { h1: 16, h2: 14, h3: 12, h4: 10 };
const ABSOLUTE_THRESHOLDS: FontThresholds = { h1: 18, h2: 14, h3: 12, h4: 10 };

/** Spacing score at which whitespace counts as emphasis */
const SPACING_EMPHASIS = 3;

// ============================================================================
// Font Thresholds
// ============================================================================

/**
 * Quantize the document's font sizes into four level thresholds.
 */
export function computeFontThresholds(sizes: number[]): FontThresholds {
  const distinct = [...new Set(sizes)].sort((a, b) => b - a);

  if (distinct.length === 0) return { ...FALLBACK_THRESHOLDS };
  if (distinct.length === 1) {
    const [size] = distinct;
    return { h1: size, h2: size, h3: size, h4: size };
  }
  if (distinct.length === 2) {
    const [largest, rest] = distinct;
    return { h1: largest, h2: rest, h3: rest, h4: rest };
  }

  const max = distinct[0];
  const min = distinct[distinct.length - 1];
  if (max >= 16 && min <= 12) {
    return { ...ABSOLUTE_THRESHOLDS, h1: Math.max(max, ABSOLUTE_THRESHOLDS.h1) };
  }

  if (distinct.length >= 4) {
    return { h1: distinct[0], h2: distinct[1], h3: distinct[2], h4: distinct[3] };
  }
  return { h1: distinct[0], h2: distinct[1], h3: distinct[2], h4: distinct[2] };
}

// ============================================================================
// Levels
// ============================================================================

export interface LevelInput {
  text: string;
  fontSize: number;
  bold: boolean;
  spacingScore?: number;
}

/**
 * Level of one heading. Priority: profile overrides, numbered top-level
 * sections, level rules from H1 down to H4, then the font-size fallback.
 */
export function determineLevel(
  input: LevelInput,
  thresholds: FontThresholds,
  profile: DocumentProfile = getDefaultCatalog().generic,
  options: ClassifierOptions = {}
): HeadingLevel {
  const text = input.text.trim();

  const override = profile.levelOverride(text);
  if (override) return override;

  if (/^\d+\.\s+[A-Z]/i.test(text)) return 'H1';

  const levelRules = profile.rules.rulesFor('level');
  for (const level of HEADING_LEVELS) {
    if (levelRules.some(rule => rule.level === level && rule.regex.test(text))) return level;
  }

  const { fontSize, bold } = input;
  const emphasized =
    bold || (options.spacingEmphasis === true && (input.spacingScore ?? 0) >= SPACING_EMPHASIS);

  if (fontSize >= thresholds.h1 && bold) return 'H1';
  if (fontSize >= thresholds.h2 || (fontSize >= thresholds.h3 && emphasized)) return 'H2';
  if (fontSize >= thresholds.h3) return 'H3';
  return 'H4';
}

// ============================================================================
// Outline Assembly
// ============================================================================

interface LeveledHeading {
  text: string;
  page: number;
  level: HeadingLevel;
}

export function sortByReadingOrder(candidates: HeadingCandidate[]): HeadingCandidate[] {
  return [...candidates].sort((a, b) => a.page - b.page || a.y - b.y);
}

export function removeDuplicates<T extends { text: string }>(headings: T[]): T[] {
  const seen = new Set<string>();
  return headings.filter(h => {
    const key = normalizeText(h.text);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Clamp downward jumps of more than one level. Never reorders.
 */
export function repairHierarchy<T extends { level: HeadingLevel }>(headings: T[]): T[] {
  let prev: number | undefined;
  return headings.map(h => {
    const current = levelNumber(h.level);
    const level = prev !== undefined && current > prev + 1 ? levelFromNumber(prev + 1) : h.level;
    prev = levelNumber(level);
    return level === h.level ? h : { ...h, level };
  });
}

/**
 * Ordered, leveled, deduplicated outline from the accepted candidates.
 */
export function classifyHeadings(
  candidates: HeadingCandidate[],
  profile: DocumentProfile = getDefaultCatalog().generic,
  options: ClassifierOptions = {}
): OutlineEntry[] {
  if (candidates.length === 0) return [];

  const ordered = sortByReadingOrder(candidates);
  const thresholds = computeFontThresholds(ordered.map(c => c.fontSize));

  const leveled: LeveledHeading[] = ordered.map(c => ({
    text: c.text.trim(),
    page: c.page,
    level: determineLevel(c, thresholds, profile, options),
  }));

  const kept = leveled.filter(h => !shouldExcludeHeading(h.text, profile.rules));
  const unique = removeDuplicates(kept);

  return repairHierarchy(unique).map(h => ({
    level: h.level,
    text: `${h.text} `,
    page: h.page,
  }));
}
