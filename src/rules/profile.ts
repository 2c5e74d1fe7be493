import type { HeadingLevel, LayoutDocument } from '../types';
import { lineText } from '../types';
import type { ProfileConfig } from './schema';
import { compileRule, type RuleSet } from './rule-set';
import { RuleConfigError } from '../errors';

/**
 * Document-family profile.
 *
 * A profile is selected once per document and adjusts the generic engine at
 * its decision points: acceptance threshold, page numbering, forced levels
 * and title handling. Its rule set is the base rule set with the profile's
 * own rules consulted first.
 */
export interface DocumentProfile {
  readonly name: string;
  readonly rules: RuleSet;
  readonly defaultThreshold: number;
  readonly suppressTitle: boolean;
  matches(document: LayoutDocument): boolean;
  /** Acceptance threshold for a line; a candidate needs a strictly greater score */
  threshold(text: string, defaultThreshold?: number): number;
  remapPage(text: string, physicalPage: number): number;
  levelOverride(text: string): HeadingLevel | undefined;
  matchesTitlePattern(text: string): boolean;
  rewriteTitle(text: string): string | undefined;
}

/** Pages scanned when matching a profile against document content */
const CONTENT_MATCH_PAGES = 5;

function compilePattern(source: string, flags: string, owner: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    throw new RuleConfigError(`profile ${owner}: invalid pattern /${source}/`, {
      profile: owner,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export class RuleProfile implements DocumentProfile {
  readonly name: string;
  readonly rules: RuleSet;
  readonly defaultThreshold: number;
  readonly suppressTitle: boolean;
  private readonly pageOffset: number;
  private readonly minPage: number;
  private readonly fileNamePattern?: RegExp;
  private readonly contentPattern?: RegExp;
  private readonly titlePatterns: RegExp[];
  private readonly titleRewrites: { regex: RegExp; title: string }[];

  constructor(config: ProfileConfig, base: RuleSet) {
    this.name = config.name;
    this.rules = base.extend(config.rules.map(compileRule));
    this.defaultThreshold = config.defaultThreshold ?? base.settings.defaultThreshold;
    this.suppressTitle = config.suppressTitle;
    this.pageOffset = config.pageOffset;
    this.minPage = config.minPage;
    this.fileNamePattern = config.match.fileName
      ? compilePattern(config.match.fileName, 'i', config.name)
      : undefined;
    this.contentPattern = config.match.content
      ? compilePattern(config.match.content, 'i', config.name)
      : undefined;
    this.titlePatterns = config.titlePatterns.map(p => compilePattern(p, 'i', config.name));
    this.titleRewrites = config.titleRewrites.map(r => ({
      regex: compilePattern(r.pattern, 'i', config.name),
      title: r.title,
    }));
  }

  /**
   * The catch-all profile: base rules, no family adjustments.
   */
  static generic(base: RuleSet): RuleProfile {
    return new RuleProfile(
      {
        name: 'generic',
        match: {},
        pageOffset: 0,
        minPage: 1,
        suppressTitle: false,
        titlePatterns: [],
        titleRewrites: [],
        rules: [],
      },
      base
    );
  }

  matches(document: LayoutDocument): boolean {
    if (this.fileNamePattern?.test(document.fileName)) return true;

    const contentPattern = this.contentPattern;
    if (!contentPattern) return false;

    return document.pages
      .slice(0, CONTENT_MATCH_PAGES)
      .some(page => page.lines.some(line => contentPattern.test(lineText(line).trim())));
  }

  threshold(text: string, defaultThreshold: number = this.defaultThreshold): number {
    const rule = this.rules.first('threshold', text);
    if (rule?.value !== undefined) return rule.value;
    if (this.rules.test('structured', text)) return this.rules.settings.structuredThreshold;
    return defaultThreshold;
  }

  remapPage(text: string, physicalPage: number): number {
    const rule = this.rules.first('pageOffset', text);
    const offset = rule?.value ?? this.pageOffset;
    return Math.max(this.minPage, physicalPage + offset);
  }

  levelOverride(text: string): HeadingLevel | undefined {
    return this.rules.first('levelOverride', text)?.level;
  }

  matchesTitlePattern(text: string): boolean {
    return this.titlePatterns.some(regex => regex.test(text));
  }

  rewriteTitle(text: string): string | undefined {
    return this.titleRewrites.find(r => r.regex.test(text))?.title;
  }
}

/**
 * First profile that accepts the document, else the fallback.
 */
export function selectProfile(
  document: LayoutDocument,
  profiles: readonly DocumentProfile[],
  fallback: DocumentProfile
): DocumentProfile {
  return profiles.find(profile => profile.matches(document)) ?? fallback;
}
