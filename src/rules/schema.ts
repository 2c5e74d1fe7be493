import { z } from 'zod';

/**
 * Rule table schema.
 *
 * A rule file holds word lists, ordered pattern rules and optional
 * document-family profiles. Each rule names the decision point it feeds
 * through its `action`.
 */

export const RULE_ACTIONS = [
  // Scoring exclusions
  'exclude',
  'mustKeep',
  'nonHeading',
  'codeSnippet',
  'documentMetadata',
  'authorCredit',
  'dateLine',
  'organization',
  'technicalIdentifier',
  'longAllowed',
  // Scoring bonuses
  'structured',
  'headingIndicator',
  'academic',
  // Acceptance and page numbering
  'threshold',
  'pageOffset',
  // Levels
  'levelOverride',
  'level',
  // Final pass
  'neededHeading',
  'finalExclude',
  // Tables, TOC and title
  'obviousHeading',
  'tocLabel',
  'tocEntry',
  'tocPageEntry',
  'titleShape',
  'titleExclude',
] as const;

export type RuleAction = (typeof RULE_ACTIONS)[number];

const NUMERIC_ACTIONS: readonly RuleAction[] = ['threshold', 'pageOffset'];
const LEVEL_ACTIONS: readonly RuleAction[] = ['levelOverride', 'level'];

export const headingLevelSchema = z.enum(['H1', 'H2', 'H3', 'H4']);

export const ruleSchema = z
  .object({
    id: z.string().min(1),
    pattern: z.string().min(1),
    flags: z.string().regex(/^[imsu]*$/, 'only i, m, s and u flags are allowed').default(''),
    action: z.enum(RULE_ACTIONS),
    priority: z.number().int().default(0),
    value: z.union([z.number(), headingLevelSchema]).optional(),
  })
  .superRefine((rule, ctx) => {
    if (NUMERIC_ACTIONS.includes(rule.action) && typeof rule.value !== 'number') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `rule ${rule.id}: action ${rule.action} needs a numeric value`,
      });
    }
    if (LEVEL_ACTIONS.includes(rule.action) && typeof rule.value !== 'string') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `rule ${rule.id}: action ${rule.action} needs a heading level value`,
      });
    }
  });

const wordList = z.array(z.string().min(1)).default([]);

export const wordListsSchema = z
  .object({
    commonNonHeadings: wordList,
    strictNonHeadings: wordList,
    metadataLabels: wordList,
    titleSmallWords: wordList,
    headingSmallWords: wordList,
    tableHeaderKeywords: wordList,
    documentTypeKeywords: wordList,
    nonHeadingIndicators: wordList,
    bylineIndicators: wordList,
    documentFragments: wordList,
    danglingEndings: wordList,
    numberedDanglingEndings: wordList,
  })
  .default({});

export const settingsSchema = z
  .object({
    defaultThreshold: z.number().nonnegative().default(4),
    structuredThreshold: z.number().nonnegative().default(0.5),
    minTitleScore: z.number().default(3),
  })
  .default({});

export const profileSchema = z.object({
  name: z.string().min(1),
  match: z
    .object({
      fileName: z.string().min(1).optional(),
      content: z.string().min(1).optional(),
    })
    .default({}),
  defaultThreshold: z.number().nonnegative().optional(),
  pageOffset: z.number().int().default(0),
  minPage: z.number().int().default(1),
  suppressTitle: z.boolean().default(false),
  titlePatterns: z.array(z.string().min(1)).default([]),
  titleRewrites: z
    .array(z.object({ pattern: z.string().min(1), title: z.string() }))
    .default([]),
  rules: z.array(ruleSchema).default([]),
});

export const ruleFileSchema = z.object({
  version: z.literal(1),
  settings: settingsSchema,
  wordLists: wordListsSchema,
  rules: z.array(ruleSchema),
  profiles: z.array(profileSchema).default([]),
});

export type RuleConfig = z.infer<typeof ruleSchema>;
export type WordLists = z.infer<typeof wordListsSchema>;
export type WordListName = keyof WordLists;
export type RuleSettings = z.infer<typeof settingsSchema>;
export type ProfileConfig = z.infer<typeof profileSchema>;
export type RuleFile = z.infer<typeof ruleFileSchema>;
