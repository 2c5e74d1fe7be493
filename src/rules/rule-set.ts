import type { HeadingLevel } from '../types';
import type { RuleAction, RuleConfig, RuleSettings, WordListName, WordLists } from './schema';
import { RuleConfigError } from '../errors';

export interface CompiledRule {
  id: string;
  action: RuleAction;
  priority: number;
  regex: RegExp;
  value?: number;
  level?: HeadingLevel;
}

export function compileRule(rule: RuleConfig): CompiledRule {
  let regex: RegExp;
  try {
    regex = new RegExp(rule.pattern, rule.flags);
  } catch (err) {
    throw new RuleConfigError(`rule ${rule.id}: invalid pattern /${rule.pattern}/`, {
      ruleId: rule.id,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  return {
    id: rule.id,
    action: rule.action,
    priority: rule.priority,
    regex,
    value: typeof rule.value === 'number' ? rule.value : undefined,
    level: typeof rule.value === 'string' ? rule.value : undefined,
  };
}

function groupByAction(rules: CompiledRule[]): Map<RuleAction, CompiledRule[]> {
  const groups = new Map<RuleAction, CompiledRule[]>();
  for (const rule of rules) {
    const group = groups.get(rule.action) ?? [];
    group.push(rule);
    groups.set(rule.action, group);
  }
  // Array.prototype.sort is stable: equal priorities keep file order
  for (const group of groups.values()) {
    group.sort((a, b) => b.priority - a.priority);
  }
  return groups;
}

/**
 * Immutable, compiled rule table.
 *
 * Rules are grouped by action and ordered by descending priority; within a
 * group the first matching rule wins.
 */
export class RuleSet {
  private readonly groups: Map<RuleAction, CompiledRule[]>;
  private readonly lists: Map<string, ReadonlySet<string>>;
  private readonly wordLists: WordLists;
  readonly settings: Readonly<RuleSettings>;

  constructor(rules: CompiledRule[], wordLists: WordLists, settings: RuleSettings) {
    this.groups = groupByAction(rules);
    this.wordLists = wordLists;
    this.lists = new Map();
    for (const [name, words] of Object.entries(wordLists)) {
      this.lists.set(name, new Set(words.map(w => w.toLowerCase())));
    }
    this.settings = Object.freeze({ ...settings });
    Object.freeze(this);
  }

  rulesFor(action: RuleAction): readonly CompiledRule[] {
    return this.groups.get(action) ?? [];
  }

  /**
   * First rule of the action whose pattern matches the text.
   */
  first(action: RuleAction, text: string): CompiledRule | undefined {
    return this.rulesFor(action).find(rule => rule.regex.test(text));
  }

  test(action: RuleAction, text: string): boolean {
    return this.first(action, text) !== undefined;
  }

  /**
   * Exact, case-insensitive membership in a word list.
   */
  hasWord(list: WordListName, word: string): boolean {
    return this.lists.get(list)?.has(word.toLowerCase()) ?? false;
  }

  words(list: WordListName): string[] {
    return [...(this.lists.get(list) ?? [])];
  }

  /**
   * Case-insensitive substring match against any entry of a word list.
   */
  containsAny(list: WordListName, text: string): boolean {
    const lower = text.toLowerCase();
    return this.words(list).some(word => lower.includes(word));
  }

  startsWithAny(list: WordListName, text: string): boolean {
    const lower = text.trim().toLowerCase();
    return this.words(list).some(word => lower.startsWith(word));
  }

  /**
   * A new set where the given rules are consulted before this set's rules.
   */
  extend(rules: CompiledRule[]): RuleSet {
    if (rules.length === 0) return this;

    const front = groupByAction(rules);
    const merged: CompiledRule[] = [];
    const actions = new Set<RuleAction>([...front.keys(), ...this.groups.keys()]);
    for (const action of actions) {
      merged.push(...(front.get(action) ?? []));
      merged.push(...this.rulesFor(action));
    }

    return RuleSet.fromOrdered(merged, this.wordLists, this.settings);
  }

  private static fromOrdered(rules: CompiledRule[], wordLists: WordLists, settings: RuleSettings): RuleSet {
    // Keep the given order: re-sorting would interleave profile and base rules
    const ordered = rules.map((rule, index) => ({ ...rule, priority: rules.length - index }));
    return new RuleSet(ordered, wordLists, settings);
  }
}
