import { z } from 'zod';
import nameAliasesJson from './name-aliases.json';
import correctionRulesJson from './correction-rules.json';
import descriptionRulesJson from './description-rules.json';

/** Injection token for the frozen rule tables */
export const RULE_TABLES = Symbol('RULE_TABLES');

const NameAliasesSchema = z.object({
  version: z.string().min(1),
  aliases: z.record(
    z.object({
      canonical: z.string().min(1),
      model: z.string().regex(/^M\d+$/),
    }),
  ),
  vsn700Spellings: z.record(z.string().min(1)),
  proprietaryPoints: z.array(z.string().min(1)),
});

const DeviceClassFixSchema = z.object({
  deviceClass: z.string().nullable().optional(),
  unit: z.string().optional(),
  entityCategory: z.literal('diagnostic').nullable().optional(),
  icon: z.string().optional(),
});

const PeriodPhraseSchema = z.object({
  pattern: z.string().min(1),
  suffix: z.enum(['Week', 'Month', 'Year', 'Lifetime']),
});

const CorrectionRulesSchema = z.object({
  version: z.string().min(1),
  displayNameCorrections: z.record(z.string()),
  labelCorrections: z.record(z.string()),
  deviceClassFixes: z.record(DeviceClassFixSchema),
  redundantPrefixes: z.array(z.string().min(1)),
  periodPhrases: z.array(PeriodPhraseSchema),
  unitOverrides: z.record(z.string()),
});

const DescriptionRulesSchema = z.object({
  version: z.string().min(1),
  genericDescriptions: z.array(z.string()),
  commonModelBoilerplate: z.object({
    model: z.string(),
    phrase: z.string().min(1),
  }),
  improvements: z.record(z.string().min(1)),
});

export type NameAliasRules = z.infer<typeof NameAliasesSchema>;
export type CorrectionRules = z.infer<typeof CorrectionRulesSchema>;
export type DeviceClassFix = z.infer<typeof DeviceClassFixSchema>;
export type PeriodPhrase = z.infer<typeof PeriodPhraseSchema>;
export type DescriptionRules = z.infer<typeof DescriptionRulesSchema>;

export interface RuleTables {
  readonly nameAliases: NameAliasRules;
  readonly corrections: CorrectionRules;
  readonly descriptions: DescriptionRules;
}

/**
 * Recursively freeze a value in place and return it
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Compile a period phrase into an anchored, case-insensitive expression.
 * Group 1 captures the text before the phrase, which must be non-empty.
 */
export function compilePeriodPhrase(phrase: PeriodPhrase): RegExp {
  return new RegExp(`^(.*?\\S)${phrase.pattern}$`, 'i');
}

/**
 * Validate raw rule documents and return them as one frozen structure.
 */
export function parseRuleTables(raw: {
  nameAliases: unknown;
  corrections: unknown;
  descriptions: unknown;
}): RuleTables {
  const corrections = CorrectionRulesSchema.parse(raw.corrections);
  // compile each period pattern once to reject malformed ones
  corrections.periodPhrases.forEach((phrase) => compilePeriodPhrase(phrase));

  return deepFreeze({
    nameAliases: NameAliasesSchema.parse(raw.nameAliases),
    corrections,
    descriptions: DescriptionRulesSchema.parse(raw.descriptions),
  });
}

/**
 * Load the bundled rule tables
 */
export function loadRuleTables(): RuleTables {
  return parseRuleTables({
    nameAliases: nameAliasesJson,
    corrections: correctionRulesJson,
    descriptions: descriptionRulesJson,
  });
}

/**
 * Version string stamped into the mapping artifact; changes whenever any
 * rule document is re-versioned.
 */
export function rulesVersionOf(rules: RuleTables): string {
  return [
    `aliases@${rules.nameAliases.version}`,
    `corrections@${rules.corrections.version}`,
    `descriptions@${rules.descriptions.version}`,
  ].join('+');
}
