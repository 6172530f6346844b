import { createHash } from 'node:crypto';
import { Logger } from '@nestjs/common';
import { CorrectionOrderError } from '../../common/errors';
import { CorrectionMismatchWarning } from '../../common/issues';
import { CanonicalMappingEntry } from '../interfaces/canonical-mapping.interface';
import { CorrectionRules } from '../rules/rule-tables';
import { CorrectionPass, createCorrectionPasses } from './correction-passes';

/**
 * Required pass sequence. Label fixes must precede device-class fixes,
 * which are keyed by the corrected label.
 */
export const CORRECTION_PASS_ORDER = [
  'display-name',
  'label',
  'device-class',
  'redundant-prefix',
  'period',
  'unit-override',
] as const;

export function passOrderChecksum(names: readonly string[]): string {
  return createHash('sha256').update(names.join('\n')).digest('hex');
}

const EXPECTED_CHECKSUM = passOrderChecksum(CORRECTION_PASS_ORDER);

export interface CorrectionPipelineOptions {
  /** Skip the pass-order check; diagnostics only */
  unchecked?: boolean;
}

export interface CorrectionRunResult {
  entries: CanonicalMappingEntry[];
  warnings: CorrectionMismatchWarning[];
  /** Entries changed by at least one pass */
  correctedCount: number;
}

/**
 * Correction Pipeline
 *
 * Runs the passes in sequence over every entry. Before running, the
 * sequence of pass names is checksummed against CORRECTION_PASS_ORDER.
 * Rule keys that never matched over the whole run come back as warnings.
 */
export class CorrectionPipeline {
  private readonly logger = new Logger(CorrectionPipeline.name);

  constructor(
    private readonly passes: readonly CorrectionPass[],
    private readonly options: CorrectionPipelineOptions = {},
  ) {}

  static fromRules(
    rules: CorrectionRules,
    options?: CorrectionPipelineOptions,
  ): CorrectionPipeline {
    return new CorrectionPipeline(createCorrectionPasses(rules), options);
  }

  get passNames(): string[] {
    return this.passes.map((pass) => pass.name);
  }

  run(entries: readonly CanonicalMappingEntry[]): CorrectionRunResult {
    this.verifyOrder();

    const matched = new Map<string, Set<string>>(
      this.passes.map((pass) => [pass.name, new Set<string>()]),
    );
    let correctedCount = 0;

    const corrected = entries.map((original) => {
      let entry = original;
      for (const pass of this.passes) {
        const result = pass.apply(entry);
        result.matched.forEach((key) => matched.get(pass.name)?.add(key));
        entry = result.entry;
      }
      if (entry !== original) {
        correctedCount++;
      }
      return entry;
    });

    const warnings: CorrectionMismatchWarning[] = this.passes.flatMap((pass) =>
      pass
        .ruleKeys()
        .filter((key) => !matched.get(pass.name)?.has(key))
        .map((key) => ({
          kind: 'correction-mismatch' as const,
          pass: pass.name,
          ruleKey: key,
          message: `Correction rule '${key}' in pass '${pass.name}' matched no entry`,
        })),
    );

    this.logger.log(
      `Corrections applied to ${correctedCount}/${entries.length} entries (${warnings.length} unmatched rules)`,
    );
    return { entries: corrected, warnings, correctedCount };
  }

  private verifyOrder(): void {
    if (this.options.unchecked) {
      this.logger.warn('Running correction passes without the order check');
      return;
    }
    const actual = this.passNames;
    if (passOrderChecksum(actual) !== EXPECTED_CHECKSUM) {
      throw new CorrectionOrderError([...CORRECTION_PASS_ORDER], actual);
    }
  }
}
