import { RawValue } from '../../common/raw-snapshot.schema';
import { TransformFailure } from '../../common/errors';
import {
  CanonicalMappingEntry,
  VendorVocabulary,
} from '../../mapping/interfaces/canonical-mapping.interface';
import { StateCodeTranslator } from './state-codes';

/** Seconds between 1970-01-01 and the device clock origin 2000-01-01 (UTC) */
export const AURORA_EPOCH_OFFSET = 946684800;

export const BYTES_PER_MB = 1048576;

/** Energy counters are always reported in kWh */
export const ENERGY_UNIT = 'kWh';

/**
 * Energy reading in kWh. Entries without a recognised energy unit are
 * taken to be in Wh, the unit both dataloggers report.
 */
export function toKilowattHours(value: number, unit: string): number {
  switch (unit) {
    case 'kWh':
      return value;
    case 'MWh':
      return value * 1000;
    default:
      return value / 1000;
  }
}

export interface TransformContext {
  entry: CanonicalMappingEntry;
  vocabulary: VendorVocabulary;
}

/**
 * A transformed value. `unit` replaces the entry unit when set;
 * `timestamp` replaces the poll time when set.
 */
export interface TransformOutput {
  value: RawValue;
  unit?: string;
  rawCode?: number;
  timestamp?: Date;
}

export type ValueTransform = (
  value: Exclude<RawValue, null>,
  context: TransformContext,
) => TransformOutput;

export interface ValueTransformOptions {
  /** Cabinet/booster readings above this are taken as 10x too large */
  temperatureThreshold: number;
}

/**
 * Coerce a raw reading to a finite number. Numeric strings are accepted.
 */
export function toFiniteNumber(
  value: Exclude<RawValue, null>,
  canonicalName: string,
): number {
  const number =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : NaN;
  if (!Number.isFinite(number)) {
    throw new TransformFailure(canonicalName, value, 'expected a number');
  }
  return number;
}

const multiplied =
  (factor: number, unit: string): ValueTransform =>
  (value, { entry }) => ({
    value: toFiniteNumber(value, entry.canonicalName) * factor,
    unit,
  });

const divided =
  (divisor: number, unit: string): ValueTransform =>
  (value, { entry }) => ({
    value: toFiniteNumber(value, entry.canonicalName) / divisor,
    unit,
  });

const stripDashes: ValueTransform = (value) => ({
  value: typeof value === 'string' ? value.replace(/^-+|-+$/g, '') : value,
});

const titleCase: ValueTransform = (value) => ({
  value:
    typeof value === 'string'
      ? value
          .toLowerCase()
          .replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) =>
            `${before}${letter.toUpperCase()}`,
          )
      : value,
});

/**
 * Value Transform Library
 *
 * Rules are keyed by canonical name, with per-vocabulary variants where
 * the two datalogger generations report the same point in different
 * units. Points without a rule pass through unchanged. Energy counters
 * (device class `energy`) are converted to kWh from the entry unit.
 */
export class ValueTransformRegistry {
  private readonly rules: ReadonlyMap<
    string,
    Partial<Record<VendorVocabulary | 'any', ValueTransform>>
  >;

  constructor(
    private readonly options: ValueTransformOptions,
    private readonly stateCodes = new StateCodeTranslator(),
  ) {
    const leakage = {
      vsn300: divided(1000, 'mA'),
      vsn700: multiplied(1000, 'mA'),
    };
    const memory = { any: divided(BYTES_PER_MB, 'MB') };
    const temperature = { any: this.correctTemperature };

    this.rules = new Map<
      string,
      Partial<Record<VendorVocabulary | 'any', ValueTransform>>
    >([
      ['ILeakDcAc', leakage],
      ['ILeakDcDc', leakage],
      ['TmpCab', temperature],
      ['TmpBoost', temperature],
      ['SysTime', { any: this.translateEpoch }],
      ['flash_free', memory],
      ['free_ram', memory],
      ['store_size', memory],
      ['pn', { any: stripDashes }],
      ['Md', { any: stripDashes }],
      ['type', { any: titleCase }],
    ]);
  }

  /**
   * Apply the rule for this entry. Null readings pass through.
   *
   * @throws TransformFailure when a numeric rule receives a non-number
   */
  apply(value: RawValue, context: TransformContext): TransformOutput {
    if (value === null) {
      return { value };
    }

    const { entry, vocabulary } = context;
    const stateTable = this.stateCodes.tableFor(entry.canonicalName);
    if (stateTable) {
      const code = toFiniteNumber(value, entry.canonicalName);
      if (!Number.isInteger(code)) {
        throw new TransformFailure(
          entry.canonicalName,
          value,
          'state code must be an integer',
        );
      }
      const { text } = this.stateCodes.translate(stateTable, code);
      return { value: text, rawCode: code };
    }

    const variants = this.rules.get(entry.canonicalName);
    const rule = variants?.[vocabulary] ?? variants?.any;
    if (rule) {
      return rule(value, context);
    }

    if (entry.deviceClass === 'energy') {
      return {
        value: toKilowattHours(
          toFiniteNumber(value, entry.canonicalName),
          entry.unit,
        ),
        unit: ENERGY_UNIT,
      };
    }
    return { value };
  }

  private readonly correctTemperature: ValueTransform = (value, { entry }) => {
    const celsius = toFiniteNumber(value, entry.canonicalName);
    return {
      value: celsius > this.options.temperatureThreshold ? celsius / 10 : celsius,
    };
  };

  private readonly translateEpoch: ValueTransform = (value, { entry }) => {
    const seconds = toFiniteNumber(value, entry.canonicalName);
    if (seconds <= 0) {
      throw new TransformFailure(
        entry.canonicalName,
        value,
        'device clock must be positive',
      );
    }
    const timestamp = new Date((seconds + AURORA_EPOCH_OFFSET) * 1000);
    if (Number.isNaN(timestamp.getTime())) {
      throw new TransformFailure(
        entry.canonicalName,
        value,
        'device clock out of range',
      );
    }
    return { value: timestamp.toISOString(), timestamp };
  };
}
