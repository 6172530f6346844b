import type { ModelId, VendorVocabulary } from './canonical-mapping.interface';

export type StandardsOrigin = 'sunspec' | 'vendor-extension';

/**
 * One point definition from a standards workbook.
 * Immutable after load.
 */
export interface StandardsDefinition {
  origin: StandardsOrigin;
  modelId: ModelId;
  pointName: string;
  label: string;
  description: string;
  dataType: string;
  unit: string;
  /** Name of the scale-factor point, when the workbook declares one */
  scaleFactorRef?: string;
}

/**
 * Everything one capture says about a single point name.
 */
export interface VendorPointRecord {
  vocabulary: VendorVocabulary;
  pointName: string;
  inLivedata: boolean;
  inFeeds: boolean;
  inStatus: boolean;
  feedTitle?: string;
  feedUnit?: string;
  statusLabel?: string;
}

/**
 * All loaded inputs of one mapping build.
 */
export interface MappingSources {
  vendorRecords: VendorPointRecord[];
  standards: StandardsDefinition[];
}
