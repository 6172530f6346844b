import { NormalizationIssue } from '../../common/issues';
import { RawValue } from '../../common/raw-snapshot.schema';
import {
  EntityCategory,
  ModelId,
  PointCategory,
} from '../../mapping/interfaces/canonical-mapping.interface';

/**
 * One raw reading as reported by a datalogger
 */
export interface RawTelemetryPoint {
  name: string;
  value: RawValue;
}

/**
 * A reading expressed in the canonical vocabulary. Created frozen.
 */
export interface NormalizedPoint {
  readonly deviceId: string;
  readonly canonicalName: string;
  /** Raw point name the value came from */
  readonly sourceName: string;
  readonly value: RawValue;
  /** Original code for state-code points; `value` holds the text */
  readonly rawCode?: number;
  readonly unit: string;
  readonly label: string;
  readonly displayName: string;
  readonly description: string;
  readonly category: PointCategory;
  readonly deviceClass?: string;
  readonly stateClass?: string;
  readonly entityCategory?: EntityCategory;
  readonly icon?: string;
  readonly models: readonly ModelId[];
  readonly compatibleWithVsn300: boolean;
  readonly compatibleWithVsn700: boolean;
  /** ISO-8601; poll time, or the device clock for the system time point */
  readonly timestamp: string;
}

export interface NormalizedSnapshot {
  deviceId: string;
  points: readonly NormalizedPoint[];
  issues: NormalizationIssue[];
}
