import { describe, it, expect } from 'vitest';
import {
  hasDanglingEnding,
  isAllCaps,
  isAuthorOrMetadata,
  isBracketed,
  isCodeSnippet,
  isObviousNonHeading,
  isPartOfTitle,
  isSentenceFragment,
  isStandaloneHeadingLine,
  isTocEntry,
  isTocLabel,
  isTocPageEntry,
  isUniversalMetadata,
  looksLikeProperHeading,
  normalizeText,
  shouldExcludeHeading,
} from '../patterns';
import { getDefaultRules } from '../rules';

const rules = getDefaultRules();

describe('text shape', () => {
  it('detects all caps text', () => {
    expect(isAllCaps('SCOPE OF WORK')).toBe(true);
    expect(isAllCaps('Scope')).toBe(false);
    expect(isAllCaps('2024')).toBe(false);
  });

  it('normalizes case and whitespace', () => {
    expect(normalizeText('  Project   Scope ')).toBe('project scope');
  });

  it('detects bracketed text', () => {
    expect(isBracketed('(see below)')).toBe(true);
    expect(isBracketed('[1]')).toBe(true);
    expect(isBracketed('Results (final)')).toBe(false);
  });
});

describe('exclusion shapes', () => {
  it('rejects page numbers, copyright and file references', () => {
    expect(isObviousNonHeading('Page 4', rules)).toBe(true);
    expect(isObviousNonHeading('Copyright © 2024 Acme Corp', rules)).toBe(true);
    expect(isObviousNonHeading('Microsoft Word - draft.docx', rules)).toBe(true);
    expect(isObviousNonHeading('March 2024', rules)).toBe(true);
    expect(isObviousNonHeading('Project Scope', rules)).toBe(false);
  });

  it('rejects code, callouts and captions', () => {
    expect(isCodeSnippet('console.log(value)', rules)).toBe(true);
    expect(isCodeSnippet('Note: values are rounded', rules)).toBe(true);
    expect(isCodeSnippet('Table 3: Regional totals', rules)).toBe(true);
    expect(isCodeSnippet('Figure 2.1 Overview', rules)).toBe(true);
    expect(isCodeSnippet('Status:', rules)).toBe(true);
    expect(isCodeSnippet('1) first item', rules)).toBe(true);
  });

  it('keeps contents labels that start like captions', () => {
    expect(isCodeSnippet('Table of Contents', rules)).toBe(false);
    expect(isCodeSnippet('Figures and Diagrams', rules)).toBe(false);
  });

  it('rejects bylines, credits and dates', () => {
    expect(isAuthorOrMetadata('Jordan Smith.', rules)).toBe(true);
    expect(isAuthorOrMetadata('Edited by the review board', rules)).toBe(true);
    expect(isAuthorOrMetadata('Written by: A. Writer', rules)).toBe(true);
    expect(isAuthorOrMetadata('March 3, 2024', rules)).toBe(true);
    expect(isAuthorOrMetadata('2024-03-01', rules)).toBe(true);
    expect(isAuthorOrMetadata('Project Scope', rules)).toBe(false);
  });

  it('rejects universal metadata', () => {
    expect(isUniversalMetadata('Confidential', rules)).toBe(true);
    expect(isUniversalMetadata('ISBN 978-0-00-000000-0', rules)).toBe(true);
    expect(isUniversalMetadata('Department of Energy', rules)).toBe(true);
    expect(isUniversalMetadata('v2.1', rules)).toBe(true);
    expect(isUniversalMetadata('Continued below...', rules)).toBe(true);
    expect(isUniversalMetadata('Project Scope', rules)).toBe(false);
  });

  it('detects dangling endings', () => {
    expect(hasDanglingEnding('Strategy for', rules)).toBe(true);
    expect(hasDanglingEnding('Risks and', rules)).toBe(true);
    expect(hasDanglingEnding('Risks and Issues', rules)).toBe(false);
  });

  it('detects sentence fragments', () => {
    expect(isSentenceFragment('continued from the previous page', rules)).toBe(true);
    expect(isSentenceFragment('Scope:', rules)).toBe(true);
    expect(isSentenceFragment('Funding sources, grants', rules)).toBe(false);
    expect(isSentenceFragment('Budget items -', rules)).toBe(true);
    expect(isSentenceFragment('RFP: R', rules)).toBe(true);
    expect(isSentenceFragment('2.1 Regional Results', rules)).toBe(false);
    expect(isSentenceFragment('Project Scope', rules)).toBe(false);
  });
});

describe('heading shapes', () => {
  it('recognizes title-case headings', () => {
    expect(looksLikeProperHeading('Goals and Measures', rules)).toBe(true);
    expect(looksLikeProperHeading('Introduction', rules)).toBe(true);
    expect(looksLikeProperHeading('This is a plain sentence', rules)).toBe(false);
    expect(looksLikeProperHeading('lowercase start', rules)).toBe(false);
  });

  it('recognizes standalone lines', () => {
    expect(isStandaloneHeadingLine('Next Steps')).toBe(true);
    expect(isStandaloneHeadingLine('It ends here.')).toBe(false);
    expect(isStandaloneHeadingLine('Acme Inc.')).toBe(true);
  });
});

describe('shouldExcludeHeading', () => {
  it('drops links, brackets and short text', () => {
    expect(shouldExcludeHeading('www.example.com', rules)).toBe(true);
    expect(shouldExcludeHeading('[draft]', rules)).toBe(true);
    expect(shouldExcludeHeading('Q&A', rules)).toBe(true);
  });

  it('drops trailing clauses unless they open a division', () => {
    expect(shouldExcludeHeading('Costs, benefits;', rules)).toBe(true);
    expect(shouldExcludeHeading('Chapter 3,', rules)).toBe(false);
  });

  it('keeps needed headings', () => {
    expect(shouldExcludeHeading('Timeline:', rules)).toBe(false);
    expect(shouldExcludeHeading('Phase II: Delivery', rules)).toBe(false);
  });

  it('drops dates and metrics', () => {
    expect(shouldExcludeHeading('March 3, 2024', rules)).toBe(true);
    expect(shouldExcludeHeading('95%', rules)).toBe(true);
    expect(shouldExcludeHeading('120 users', rules)).toBe(true);
  });

  it('keeps ordinary headings', () => {
    expect(shouldExcludeHeading('Project Scope', rules)).toBe(false);
  });
});

describe('table of contents', () => {
  it('recognizes labels and dot-leader entries', () => {
    expect(isTocLabel('Table of Contents', rules)).toBe(true);
    expect(isTocLabel('Contents', rules)).toBe(true);
    expect(isTocLabel('Contents of the Box', rules)).toBe(false);
    expect(isTocEntry('2. Methods ........ 7', rules)).toBe(true);
    expect(isTocEntry('2. Methods', rules)).toBe(false);
  });

  it('treats a trailing page number as an entry on a contents page', () => {
    expect(isTocPageEntry('3. Results 12', rules)).toBe(true);
    expect(isTocPageEntry('Appendix B ........ 40', rules)).toBe(true);
    expect(isTocPageEntry('Contents', rules)).toBe(false);
    expect(isTocPageEntry('2. Scope', rules)).toBe(false);
  });
});

describe('isPartOfTitle', () => {
  it('matches containment either way', () => {
    expect(isPartOfTitle('Annual Review', 'The Annual Review 2024')).toBe(true);
    expect(isPartOfTitle('The  annual review 2024 edition', 'Annual Review 2024')).toBe(true);
    expect(isPartOfTitle('Methods', 'Annual Review')).toBe(false);
    expect(isPartOfTitle('Methods', '')).toBe(false);
  });
});
