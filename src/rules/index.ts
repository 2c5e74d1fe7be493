/**
 * Rule tables and document-family profiles.
 *
 * The default table ships as JSON beside this module. It is validated and
 * compiled once, on first use, and shared read-only for the life of the
 * process.
 */

import defaultRulesJson from './default-rules.json';
import { ruleFileSchema, type RuleFile } from './schema';
import { RuleSet, compileRule } from './rule-set';
import { RuleProfile, selectProfile, type DocumentProfile } from './profile';
import { RuleConfigError } from '../errors';

export interface RuleCatalog {
  rules: RuleSet;
  generic: DocumentProfile;
  profiles: DocumentProfile[];
}

/**
 * Validate a rule file and compile it into a catalog.
 */
export function loadRuleCatalog(json: unknown): RuleCatalog {
  const parsed = ruleFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new RuleConfigError(`Invalid rule file: ${issues.join('; ')}`, { issues });
  }
  return compileCatalog(parsed.data);
}

function compileCatalog(file: RuleFile): RuleCatalog {
  const rules = new RuleSet(file.rules.map(compileRule), file.wordLists, file.settings);
  const names = new Set<string>();
  const profiles = file.profiles.map(config => {
    if (names.has(config.name)) {
      throw new RuleConfigError(`Duplicate profile name: ${config.name}`, { profile: config.name });
    }
    names.add(config.name);
    return new RuleProfile(config, rules);
  });

  return Object.freeze({
    rules,
    generic: RuleProfile.generic(rules),
    profiles: Object.freeze(profiles).slice(),
  });
}

let defaultCatalog: RuleCatalog | undefined;

export function getDefaultCatalog(): RuleCatalog {
  defaultCatalog ??= loadRuleCatalog(defaultRulesJson);
  return defaultCatalog;
}

export function getDefaultRules(): RuleSet {
  return getDefaultCatalog().rules;
}

export { RuleSet, compileRule, RuleProfile, selectProfile };
export type { CompiledRule } from './rule-set';
export type { DocumentProfile };
export type {
  RuleAction,
  RuleConfig,
  RuleFile,
  RuleSettings,
  ProfileConfig,
  WordListName,
  WordLists,
} from './schema';
export { RULE_ACTIONS } from './schema';
