import { describe, it, expect } from 'vitest';
import {
  classifyHeadings,
  computeFontThresholds,
  determineLevel,
  removeDuplicates,
  repairHierarchy,
} from '../classifier';
import { getDefaultCatalog, loadRuleCatalog } from '../rules';
import type { FontThresholds, HeadingCandidate, HeadingLevel } from '../types';

const { generic } = getDefaultCatalog();
const thresholds: FontThresholds = { h1: 18, h2: 14, h3: 12, h4: 10 };

function candidate(text: string, pageNumber: number, y: number, fontSize: number, bold = true): HeadingCandidate {
  return {
    text,
    page: pageNumber,
    score: 10,
    fontSize,
    bold,
    y,
    lineHeight: fontSize,
    bbox: { x0: 72, y0: y, x1: 300, y1: y + fontSize },
  };
}

describe('computeFontThresholds', () => {
  it('uses fixed defaults without sizes', () => {
    expect(computeFontThresholds([])).toEqual({ h1: 16, h2: 14, h3: 12, h4: 10 });
  });

  it('handles one and two distinct sizes', () => {
    expect(computeFontThresholds([11, 11])).toEqual({ h1: 11, h2: 11, h3: 11, h4: 11 });
    expect(computeFontThresholds([10, 14])).toEqual({ h1: 14, h2: 10, h3: 10, h4: 10 });
    expect(computeFontThresholds([24, 12])).toEqual({ h1: 24, h2: 12, h3: 12, h4: 12 });
  });

  it('switches to absolute thresholds for a wide size range', () => {
    expect(computeFontThresholds([18, 14, 10])).toEqual({ h1: 18, h2: 14, h3: 12, h4: 10 });
    expect(computeFontThresholds([22, 16, 14, 11])).toEqual({ h1: 22, h2: 14, h3: 12, h4: 10 });
  });

  it('uses the largest sizes for a narrow range', () => {
    expect(computeFontThresholds([15, 14, 13])).toEqual({ h1: 15, h2: 14, h3: 13, h4: 13 });
    expect(computeFontThresholds([15, 14, 13, 12.5, 12.5])).toEqual({ h1: 15, h2: 14, h3: 13, h4: 12.5 });
  });
});

describe('determineLevel', () => {
  const level = (text: string, fontSize = 10, bold = false): HeadingLevel =>
    determineLevel({ text, fontSize, bold }, thresholds, generic);

  it('applies shape rules before font size', () => {
    expect(level('3. Methods')).toBe('H1');
    expect(level('Appendix A: Data Tables')).toBe('H1');
    expect(level('References')).toBe('H1');
    expect(level('4.2 Sampling')).toBe('H2');
    expect(level('Background')).toBe('H2');
    expect(level('4.2.1 Weighting')).toBe('H3');
    expect(level('Timeline:')).toBe('H3');
    expect(level('Examples')).toBe('H4');
  });

  it('applies level overrides first', () => {
    expect(level('Funding sources and Uses:', 20, true)).toBe('H3');
  });

  it('falls back to font size and weight', () => {
    expect(level('Project Risks', 18, true)).toBe('H1');
    expect(level('Project Risks', 18, false)).toBe('H2');
    expect(level('Project Risks', 12, true)).toBe('H2');
    expect(level('Project Risks', 12, false)).toBe('H3');
    expect(level('Project Risks', 11, true)).toBe('H4');
  });

  it('treats generous spacing as emphasis when enabled', () => {
    const input = { text: 'Project Risks', fontSize: 12, bold: false, spacingScore: 3 };
    expect(determineLevel(input, thresholds, generic, { spacingEmphasis: true })).toBe('H2');
    expect(determineLevel(input, thresholds, generic)).toBe('H3');
  });

  it('checks level rules from H1 down regardless of priority', () => {
    const catalog = loadRuleCatalog({
      version: 1,
      rules: [
        { id: 'scope-h4', pattern: '^Scope', action: 'level', priority: 50, value: 'H4' },
        { id: 'scope-h1', pattern: '^Scope', action: 'level', priority: 1, value: 'H1' },
      ],
    });
    expect(determineLevel({ text: 'Scope', fontSize: 10, bold: false }, thresholds, catalog.generic)).toBe('H1');
  });
});

describe('repairHierarchy', () => {
  it('clamps downward jumps to one level', () => {
    const levels: HeadingLevel[] = ['H1', 'H3', 'H4', 'H2', 'H4'];
    expect(repairHierarchy(levels.map(level => ({ level }))).map(h => h.level)).toEqual([
      'H1',
      'H2',
      'H3',
      'H2',
      'H3',
    ]);
  });

  it('leaves the first heading and upward moves alone', () => {
    const levels: HeadingLevel[] = ['H3', 'H4', 'H1'];
    expect(repairHierarchy(levels.map(level => ({ level }))).map(h => h.level)).toEqual(['H3', 'H4', 'H1']);
  });
});

describe('removeDuplicates', () => {
  it('keeps the first of each normalized text', () => {
    const kept = removeDuplicates([{ text: 'Scope ' }, { text: 'scope' }, { text: 'Budget' }]);
    expect(kept).toEqual([{ text: 'Scope ' }, { text: 'Budget' }]);
  });
});

describe('classifyHeadings', () => {
  it('orders, levels, filters and deduplicates', () => {
    const outline = classifyHeadings(
      [
        candidate('2.1 Regional Results', 2, 72, 14),
        candidate('1. Introduction', 1, 200, 18),
        candidate('Background', 2, 200, 10, false),
        candidate('1. introduction', 3, 50, 18),
        candidate('Costs, benefits;', 3, 100, 14),
      ],
      generic
    );
    expect(outline).toEqual([
      { level: 'H1', text: '1. Introduction ', page: 1 },
      { level: 'H2', text: '2.1 Regional Results ', page: 2 },
      { level: 'H2', text: 'Background ', page: 2 },
    ]);
  });

  it('repairs the hierarchy after filtering', () => {
    const outline = classifyHeadings(
      [candidate('1. Scope', 1, 50, 18), candidate('1.1.1 Limits', 1, 100, 12)],
      generic
    );
    expect(outline.map(h => h.level)).toEqual(['H1', 'H2']);
  });

  it('returns an empty outline without candidates', () => {
    expect(classifyHeadings([], generic)).toEqual([]);
  });
});
