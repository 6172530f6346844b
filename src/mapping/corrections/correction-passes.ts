import { CanonicalMappingEntry } from '../interfaces/canonical-mapping.interface';
import {
  CorrectionRules,
  DeviceClassFix,
  compilePeriodPhrase,
} from '../rules/rule-tables';

export interface CorrectionPassResult {
  entry: CanonicalMappingEntry;
  /** Rule keys that fired for this entry */
  matched: string[];
}

/**
 * One pure rewrite over a single entry. Passes never mutate their input.
 */
export interface CorrectionPass {
  readonly name: string;
  /** Every rule key this pass can match, for mismatch reporting */
  ruleKeys(): string[];
  apply(entry: CanonicalMappingEntry): CorrectionPassResult;
}

const unchanged = (entry: CanonicalMappingEntry): CorrectionPassResult => ({
  entry,
  matched: [],
});

/**
 * Pass 1: exact display-name replacements
 */
export class DisplayNameCorrectionPass implements CorrectionPass {
  readonly name = 'display-name';

  constructor(private readonly corrections: Readonly<Record<string, string>>) {}

  ruleKeys(): string[] {
    return Object.keys(this.corrections);
  }

  apply(entry: CanonicalMappingEntry): CorrectionPassResult {
    const corrected = this.corrections[entry.displayName];
    if (corrected === undefined) {
      return unchanged(entry);
    }
    return {
      entry: { ...entry, displayName: corrected },
      matched: [entry.displayName],
    };
  }
}

/**
 * Pass 2: exact label replacements. When the display name mirrored the
 * old label it follows the new one.
 */
export class LabelCorrectionPass implements CorrectionPass {
  readonly name = 'label';

  constructor(private readonly corrections: Readonly<Record<string, string>>) {}

  ruleKeys(): string[] {
    return Object.keys(this.corrections);
  }

  apply(entry: CanonicalMappingEntry): CorrectionPassResult {
    const corrected = this.corrections[entry.label];
    if (corrected === undefined) {
      return unchanged(entry);
    }
    return {
      entry: {
        ...entry,
        label: corrected,
        displayName:
          entry.displayName === entry.label ? corrected : entry.displayName,
      },
      matched: [entry.label],
    };
  }
}

/**
 * Pass 3: device class, unit, entity category and icon fixes, keyed by
 * the corrected label. A null in the fix removes the field.
 */
export class DeviceClassFixPass implements CorrectionPass {
  readonly name = 'device-class';

  constructor(private readonly fixes: Readonly<Record<string, DeviceClassFix>>) {}

  ruleKeys(): string[] {
    return Object.keys(this.fixes);
  }

  apply(entry: CanonicalMappingEntry): CorrectionPassResult {
    const fix = this.fixes[entry.label];
    if (!fix) {
      return unchanged(entry);
    }

    const next: CanonicalMappingEntry = { ...entry };
    if (fix.deviceClass === null) {
      delete next.deviceClass;
      delete next.stateClass;
    } else if (fix.deviceClass !== undefined) {
      next.deviceClass = fix.deviceClass;
    }
    if (fix.unit !== undefined) {
      next.unit = fix.unit;
    }
    if (fix.entityCategory === null) {
      delete next.entityCategory;
    } else if (fix.entityCategory !== undefined) {
      next.entityCategory = fix.entityCategory;
    }
    if (fix.icon !== undefined) {
      next.icon = fix.icon;
    }
    return { entry: next, matched: [entry.label] };
  }
}

/**
 * Collapse consecutive repeated words, case-insensitively
 * (`Voltage voltage AN` -> `Voltage AN`)
 */
export function collapseRepeatedWords(text: string): string {
  return text
    .split(' ')
    .filter(
      (word, index, words) =>
        index === 0 ||
        word === '' ||
        word.toLowerCase() !== words[index - 1].toLowerCase(),
    )
    .join(' ');
}

/**
 * Pass 4: strip boilerplate prefixes from the display name. The prefix is
 * only dropped when a word remains after it.
 */
export class RedundantPrefixPass implements CorrectionPass {
  readonly name = 'redundant-prefix';

  constructor(private readonly prefixes: readonly string[]) {}

  ruleKeys(): string[] {
    return [...this.prefixes];
  }

  apply(entry: CanonicalMappingEntry): CorrectionPassResult {
    const matched: string[] = [];
    let displayName = entry.displayName;

    for (const prefix of this.prefixes) {
      const rest = displayName.slice(prefix.length);
      if (
        displayName.toLowerCase().startsWith(prefix.toLowerCase()) &&
        /^[A-Za-z]/.test(rest)
      ) {
        displayName = rest.charAt(0).toUpperCase() + rest.slice(1);
        matched.push(prefix);
      }
    }

    displayName = collapseRepeatedWords(displayName);
    if (displayName === entry.displayName) {
      return unchanged(entry);
    }
    return { entry: { ...entry, displayName }, matched };
  }
}

/**
 * Pass 5: trailing time-period phrases become a standard suffix
 * (`Energy produced in last 7 days` -> `Energy produced in - Week`)
 */
export class PeriodPhrasePass implements CorrectionPass {
  readonly name = 'period';
  private readonly compiled: ReadonlyArray<{
    key: string;
    pattern: RegExp;
    suffix: string;
  }>;

  constructor(phrases: CorrectionRules['periodPhrases']) {
    this.compiled = phrases.map((phrase) => ({
      key: phrase.suffix,
      pattern: compilePeriodPhrase(phrase),
      suffix: phrase.suffix,
    }));
  }

  ruleKeys(): string[] {
    return this.compiled.map((phrase) => phrase.key);
  }

  apply(entry: CanonicalMappingEntry): CorrectionPassResult {
    for (const phrase of this.compiled) {
      if (phrase.pattern.test(entry.displayName)) {
        return {
          entry: {
            ...entry,
            displayName: entry.displayName.replace(
              phrase.pattern,
              `$1 - ${phrase.suffix}`,
            ),
          },
          matched: [phrase.key],
        };
      }
    }
    return unchanged(entry);
  }
}

/**
 * Pass 6: per-canonical-name unit overrides
 */
export class UnitOverridePass implements CorrectionPass {
  readonly name = 'unit-override';

  constructor(private readonly overrides: Readonly<Record<string, string>>) {}

  ruleKeys(): string[] {
    return Object.keys(this.overrides);
  }

  apply(entry: CanonicalMappingEntry): CorrectionPassResult {
    const unit = this.overrides[entry.canonicalName];
    if (unit === undefined) {
      return unchanged(entry);
    }
    return { entry: { ...entry, unit }, matched: [entry.canonicalName] };
  }
}

/**
 * The six passes in their required order
 */
export function createCorrectionPasses(rules: CorrectionRules): CorrectionPass[] {
  return [
    new DisplayNameCorrectionPass(rules.displayNameCorrections),
    new LabelCorrectionPass(rules.labelCorrections),
    new DeviceClassFixPass(rules.deviceClassFixes),
    new RedundantPrefixPass(rules.redundantPrefixes),
    new PeriodPhrasePass(rules.periodPhrases),
    new UnitOverridePass(rules.unitOverrides),
  ];
}
