/**
 * Text-shape predicates
 *
 * Every predicate takes the rule set of the selected profile so the pattern
 * knowledge stays in the rule table; this module only holds the shape logic
 * that does not reduce to a single regex.
 */

import type { RuleSet } from './rules';

// ============================================================================
// Character Shape
// ============================================================================

const UPPER_START = /^\p{Lu}/u;
const LOWER_START = /^\p{Ll}/u;

export function startsUpper(text: string): boolean {
  return UPPER_START.test(text);
}

/**
 * True when the text has cased letters and all of them are upper case.
 */
export function isAllCaps(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

export function words(text: string): string[] {
  return text.trim().split(/\s+/).filter(Boolean);
}

export function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

const NUMBERED_SECTION = /^\d+\.\s+[A-Z]/;
const NUMBERED_SUBSECTION = /^\d+\.\d+\s+[A-Z]/;
const NUMBERED_PREFIX = /^\d+\./;

export function isNumberedSection(text: string): boolean {
  return NUMBERED_SECTION.test(text);
}

export function isNumberedSubsection(text: string): boolean {
  return NUMBERED_SUBSECTION.test(text);
}

// ============================================================================
// Exclusion Shapes
// ============================================================================

export function isBracketed(text: string): boolean {
  const t = text.trim();
  return (t.startsWith('(') && t.endsWith(')')) || (t.startsWith('[') && t.endsWith(']'));
}

/**
 * Page numbers, copyright, file references, metadata labels, form fields.
 */
export function isObviousNonHeading(text: string, rules: RuleSet): boolean {
  if (text.length < 3 || text.length > 300) return true;
  return rules.test('nonHeading', text.trim());
}

/**
 * Code lines, callout labels, bare form fields and list markers.
 *
 * Must-keep shapes are checked by the caller first: "Timeline:" is both a
 * form-field shape and a real heading.
 */
export function isCodeSnippet(text: string, rules: RuleSet): boolean {
  if (rules.test('codeSnippet', text)) return true;
  if (rules.startsWithAny('nonHeadingIndicators', text)) return true;
  if (/^\w+\s*:\s*$/.test(text) && text.trim().length < 20) return true;
  if (/^\d+\)\s+/.test(text) || /^\(\d+\)\s+/.test(text)) return true;
  return isDocumentMetadata(text, rules);
}

export function isDocumentMetadata(text: string, rules: RuleSet): boolean {
  const t = text.trim();
  return rules.test('documentMetadata', t) || rules.containsAny('documentFragments', t);
}

const NAME_WITH_PERIOD = /^[A-Z][a-z]+(\s+[A-Z][a-z]*)*\.\s*$/;

/**
 * Bylines, editorial credits, publisher imprints and bare dates.
 */
export function isAuthorOrMetadata(text: string, rules: RuleSet): boolean {
  const t = text.trim();

  if (NAME_WITH_PERIOD.test(t)) {
    const count = words(t.replace(/\./g, '')).length;
    if (count >= 1 && count <= 4) return true;
  }

  return (
    rules.test('authorCredit', t) ||
    rules.startsWithAny('bylineIndicators', t) ||
    rules.test('dateLine', t)
  );
}

export function isTextFragment(text: string): boolean {
  const t = text.trim();
  if (t.length < 4) return true;
  if (['...', '—', '–', ','].some(end => t.endsWith(end))) return true;
  return /^[A-Z][a-z]+\s+[a-z]+\s*$/.test(t) && t.length < 15;
}

/**
 * Metadata that looks the same in every document family: label words,
 * fragments, organizational units and identifiers.
 */
export function isUniversalMetadata(text: string, rules: RuleSet): boolean {
  const t = text.trim();
  return (
    rules.hasWord('metadataLabels', t) ||
    isTextFragment(t) ||
    rules.test('organization', t) ||
    rules.test('technicalIdentifier', t)
  );
}

function endsWithWordFrom(text: string, rules: RuleSet, list: 'danglingEndings' | 'numberedDanglingEndings'): boolean {
  const last = words(text).pop();
  if (!last || !/^\w+$/.test(last)) return false;
  return rules.hasWord(list, last);
}

/**
 * Ends on a preposition or conjunction: "Strategy for", "Risks and".
 */
export function hasDanglingEnding(text: string, rules: RuleSet): boolean {
  return endsWithWordFrom(text, rules, 'danglingEndings');
}

export function isSentenceFragment(text: string, rules: RuleSet): boolean {
  if (isNumberedSection(text) || isNumberedSubsection(text)) return false;
  if (rules.test('obviousHeading', text)) return false;

  if (LOWER_START.test(text) && !NUMBERED_PREFIX.test(text)) return true;

  // "Note: A", "Scope:"
  if (text.trim().length < 10 && /[:\s][A-Z]?\s*$/.test(text)) return true;

  if (/\b(and|or|but)\b/i.test(text) && text.length > 50 && !NUMBERED_PREFIX.test(text)) {
    return true;
  }

  if (/[,;—-]\s*$/.test(text)) return true;

  if (/^\d+\.\s+/.test(text) && endsWithWordFrom(text, rules, 'numberedDanglingEndings')) {
    return true;
  }

  // Cut-off lines: "RFP: R", "Request f"
  if (/^[A-Z]+:\s*[A-Z]?\s*$|^[A-Z][a-z]+\s+[a-z]?\s*$/.test(text)) return true;

  return text.trim().length < 15 && /\s[a-z]$/.test(text);
}

// ============================================================================
// Heading Shapes
// ============================================================================

export function isObviousHeading(text: string, rules: RuleSet): boolean {
  return rules.test('obviousHeading', text.trim());
}

export function looksLikeProperHeading(text: string, rules: RuleSet): boolean {
  if (!startsUpper(text)) return false;
  if (rules.test('headingIndicator', text)) return true;
  if (isBracketed(text)) return false;

  const list = words(text);
  if (list.length < 2 || list.length > 10) return false;

  const capitalized = list.filter(w => startsUpper(w) || rules.hasWord('headingSmallWords', w)).length;
  return capitalized >= list.length * 0.7;
}

export function isAcademicHeading(text: string, rules: RuleSet): boolean {
  return rules.test('academic', text);
}

const ABBREVIATION_ENDINGS = ['Inc.', 'Ltd.', 'Corp.', 'Co.'];

/**
 * Short, capital-initial line that does not read as a sentence.
 */
export function isStandaloneHeadingLine(text: string): boolean {
  const list = words(text);
  if (list.length <= 6 && startsUpper(text)) {
    if (!text.endsWith('.') || ABBREVIATION_ENDINGS.some(a => text.endsWith(a))) return true;
  }
  return isAllCaps(text) && text.length >= 3 && text.length <= 50 && list.length <= 5;
}

// ============================================================================
// Final Pass
// ============================================================================

const LINK_LIKE = /https?:\/\/|www\.|\.com|\.git|\.org|doi:/i;
const TRAILING_CLAUSE = /[,;—]$/;
const DIVISION_START = /^(Round|Chapter|Part)/;

/**
 * Stricter check for leveled headings that still are not headings.
 * Needed-heading rules protect known structural phrases.
 */
export function shouldExcludeHeading(text: string, rules: RuleSet): boolean {
  const t = text.trim();

  if (LINK_LIKE.test(t)) return true;
  if (isBracketed(t)) return true;
  if (t.length <= 3) return true;
  if (rules.hasWord('strictNonHeadings', t)) return true;

  if (rules.test('neededHeading', t)) return false;
  if (rules.test('finalExclude', t)) return true;

  if (TRAILING_CLAUSE.test(t) && !DIVISION_START.test(t)) return true;
  return hasDanglingEnding(t, rules);
}

// ============================================================================
// Table of Contents and Title
// ============================================================================

export function isTocLabel(text: string, rules: RuleSet): boolean {
  return rules.test('tocLabel', text.trim());
}

export function isTocEntry(text: string, rules: RuleSet): boolean {
  return rules.test('tocEntry', text.trim());
}

/**
 * Contents entry on a page that carries a contents label: a dot-leader
 * entry, or text followed by a bare page number. The label itself never is.
 */
export function isTocPageEntry(text: string, rules: RuleSet): boolean {
  const t = text.trim();
  if (isTocLabel(t, rules)) return false;
  return isTocEntry(t, rules) || rules.test('tocPageEntry', t);
}

/**
 * Either text contains the other, compared case-insensitively.
 */
export function isPartOfTitle(text: string, title: string): boolean {
  if (!title.trim()) return false;
  const a = normalizeText(text);
  const b = normalizeText(title);
  return b.includes(a) || a.includes(b);
}
