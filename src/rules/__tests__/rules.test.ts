import { describe, it, expect } from 'vitest';
import { getDefaultCatalog, loadRuleCatalog, selectProfile } from '../index';
import { RuleConfigError } from '../../errors';
import { doc, page, textLine } from '../../__tests__/helpers';

function ruleFile(extra: Record<string, unknown> = {}) {
  return { version: 1, rules: [], ...extra };
}

describe('loadRuleCatalog', () => {
  it('loads the bundled rule table', () => {
    const catalog = getDefaultCatalog();
    expect(catalog.generic.name).toBe('generic');
    expect(catalog.profiles.map(p => p.name)).toEqual(['compilation']);
    expect(catalog.rules.settings.defaultThreshold).toBe(4);
    expect(catalog.rules.settings.structuredThreshold).toBe(0.5);
  });

  it('returns the same catalog on every call', () => {
    expect(getDefaultCatalog()).toBe(getDefaultCatalog());
  });

  it('fills defaults for omitted sections', () => {
    const catalog = loadRuleCatalog(ruleFile());
    expect(catalog.rules.settings).toEqual({ defaultThreshold: 4, structuredThreshold: 0.5, minTitleScore: 3 });
    expect(catalog.rules.words('danglingEndings')).toEqual([]);
    expect(catalog.profiles).toEqual([]);
  });

  it('orders rules of one action by descending priority', () => {
    const catalog = loadRuleCatalog(
      ruleFile({
        rules: [
          { id: 'low', pattern: '^Scope', action: 'threshold', priority: 1, value: 3 },
          { id: 'high', pattern: '^Scope', action: 'threshold', priority: 9, value: 1 },
        ],
      })
    );
    expect(catalog.rules.first('threshold', 'Scope')?.id).toBe('high');
  });

  it('keeps file order for equal priorities', () => {
    const catalog = loadRuleCatalog(
      ruleFile({
        rules: [
          { id: 'first', pattern: 'a', action: 'exclude' },
          { id: 'second', pattern: 'a', action: 'exclude' },
        ],
      })
    );
    expect(catalog.rules.rulesFor('exclude').map(r => r.id)).toEqual(['first', 'second']);
  });

  it('rejects a threshold rule without a numeric value', () => {
    const bad = ruleFile({ rules: [{ id: 't', pattern: 'x', action: 'threshold' }] });
    expect(() => loadRuleCatalog(bad)).toThrow(RuleConfigError);
    expect(() => loadRuleCatalog(bad)).toThrow('action threshold needs a numeric value');
  });

  it('rejects a level rule without a heading level', () => {
    const bad = ruleFile({ rules: [{ id: 'l', pattern: 'x', action: 'level', value: 2 }] });
    expect(() => loadRuleCatalog(bad)).toThrow('action level needs a heading level value');
  });

  it('rejects an unknown action', () => {
    const bad = ruleFile({ rules: [{ id: 'u', pattern: 'x', action: 'boost' }] });
    expect(() => loadRuleCatalog(bad)).toThrow(RuleConfigError);
  });

  it('rejects an invalid pattern', () => {
    const bad = ruleFile({ rules: [{ id: 'broken', pattern: '(unclosed', action: 'exclude' }] });
    expect(() => loadRuleCatalog(bad)).toThrow('rule broken: invalid pattern /(unclosed/');
  });

  it('rejects duplicate profile names', () => {
    const bad = ruleFile({ profiles: [{ name: 'dup' }, { name: 'dup' }] });
    expect(() => loadRuleCatalog(bad)).toThrow('Duplicate profile name: dup');
  });

  it('freezes the compiled rule set', () => {
    expect(Object.isFrozen(getDefaultCatalog().rules)).toBe(true);
  });
});

describe('RuleSet', () => {
  const rules = getDefaultCatalog().rules;

  it('matches word lists exactly and case-insensitively', () => {
    expect(rules.hasWord('strictNonHeadings', 'Total')).toBe(true);
    expect(rules.hasWord('strictNonHeadings', 'Total Cost')).toBe(false);
  });

  it('matches list entries as prefixes', () => {
    expect(rules.startsWithAny('nonHeadingIndicators', 'Note: keep a copy')).toBe(true);
    expect(rules.startsWithAny('nonHeadingIndicators', 'Footnote: keep a copy')).toBe(false);
  });

  it('matches list entries as substrings', () => {
    expect(rules.containsAny('documentFragments', 'Details: see page 4')).toBe(true);
  });
});

describe('profiles', () => {
  const catalog = loadRuleCatalog(
    ruleFile({
      settings: { defaultThreshold: 4 },
      rules: [
        { id: 'summary', pattern: '^Summary$', action: 'threshold', value: 0.1 },
        { id: 'numbered', pattern: '^\\d+\\.\\s+[A-Z]', action: 'structured' },
      ],
      profiles: [
        {
          name: 'minutes',
          match: { fileName: '^minutes' },
          pageOffset: -1,
          defaultThreshold: 6,
          rules: [
            { id: 'minutes-summary', pattern: '^Summary$', action: 'threshold', value: 2 },
            { id: 'minutes-agenda', pattern: '^Agenda$', action: 'levelOverride', value: 'H2' },
            { id: 'minutes-annex', pattern: '^Annex', action: 'pageOffset', value: 5 },
          ],
        },
        {
          name: 'newsletter',
          match: { content: '^weekly\\s+bulletin' },
          suppressTitle: true,
        },
      ],
    })
  );
  const [minutes, newsletter] = catalog.profiles;

  it('selects a profile by file name', () => {
    const document = doc('Minutes-2024-03.pdf', [page(1, [])]);
    expect(selectProfile(document, catalog.profiles, catalog.generic).name).toBe('minutes');
  });

  it('selects a profile by content on the first pages', () => {
    const document = doc('issue-12.pdf', [page(1, [textLine('  Weekly Bulletin  ')])]);
    expect(selectProfile(document, catalog.profiles, catalog.generic).name).toBe('newsletter');
    expect(newsletter.suppressTitle).toBe(true);
  });

  it('falls back to the generic profile', () => {
    const document = doc('notes.pdf', [page(1, [textLine('Notes')])]);
    expect(selectProfile(document, catalog.profiles, catalog.generic)).toBe(catalog.generic);
  });

  it('consults profile rules before base rules', () => {
    expect(minutes.threshold('Summary')).toBe(2);
    expect(catalog.generic.threshold('Summary')).toBe(0.1);
  });

  it('uses the structured threshold for structured lines', () => {
    expect(minutes.threshold('3. Decisions')).toBe(0.5);
  });

  it('falls back to the given default, else the profile default', () => {
    expect(minutes.threshold('Open Items')).toBe(6);
    expect(minutes.threshold('Open Items', 3)).toBe(3);
    expect(catalog.generic.threshold('Open Items')).toBe(4);
  });

  it('remaps pages with the profile offset, never below the minimum page', () => {
    expect(minutes.remapPage('Open Items', 1)).toBe(1);
    expect(minutes.remapPage('Open Items', 4)).toBe(3);
    expect(minutes.remapPage('Annex B', 4)).toBe(9);
    expect(catalog.generic.remapPage('Open Items', 4)).toBe(4);
  });

  it('applies level overrides', () => {
    expect(minutes.levelOverride('Agenda')).toBe('H2');
    expect(minutes.levelOverride('Agenda Items')).toBeUndefined();
  });
});
