/**
 * Datalogger REST vocabularies.
 *
 * - vsn300: SunSpec-derived names (`m103_1_W`, `m64061_1_AlarmState`)
 * - vsn700: proprietary names (`Pgrid`, `Etotal`, `AlarmState`)
 */
export const VENDOR_VOCABULARIES = ['vsn300', 'vsn700'] as const;
export type VendorVocabulary = (typeof VENDOR_VOCABULARIES)[number];

/**
 * SunSpec model identifiers (`M1`, `M103`, `M64061`, ...) plus the
 * pseudo-models used for points outside any published model.
 */
export type ModelId = string;

export const VENDOR_ONLY_MODELS: Record<VendorVocabulary, ModelId> = {
  vsn300: 'VSN300_Only',
  vsn700: 'VSN700_Only',
};

export const PROPRIETARY_MODEL: ModelId = 'ABB_Proprietary';

export const POINT_CATEGORIES = [
  'Inverter',
  'MPPT',
  'Battery',
  'Meter',
  'Energy Counter',
  'House Meter',
  'System Monitoring',
  'Status',
  'Device Info',
  'Network',
  'Datalogger',
  'System',
  'Unknown',
] as const;
export type PointCategory = (typeof POINT_CATEGORIES)[number];

/**
 * Which tier of the description chain produced an entry's description.
 */
export const DESCRIPTION_TIERS = [
  'standards',
  'feed-title',
  'synthesized',
  'label-fallback',
] as const;
export type DescriptionTier = (typeof DESCRIPTION_TIERS)[number];

export type EntityCategory = 'diagnostic';

/**
 * One canonical point of the mapping table.
 *
 * Created once by the mapping build; read-only at runtime.
 */
export interface CanonicalMappingEntry {
  /** Unique key, e.g. 'W', 'DCA_1', 'AlarmState' */
  canonicalName: string;
  /** Sorted, never empty */
  models: ModelId[];
  /** True when no published or proprietary model tagged the point */
  vendorOnly: boolean;
  vsn300Name?: string;
  vsn700Name?: string;
  label: string;
  description: string;
  descriptionSource: DescriptionTier;
  displayName: string;
  category: PointCategory;
  unit: string;
  deviceClass?: string;
  stateClass?: string;
  entityCategory?: EntityCategory;
  icon?: string;
  inVsn300Feed: boolean;
  inVsn700Feed: boolean;
  availableInWireProtocol: boolean;
  /** Category could not be determined; flagged for manual review */
  needsReview: boolean;
}
