// Re-export public API
export { NormalizationModule } from './normalization.module';
export { NormalizerService } from './normalizer.service';
export {
  CANONICAL_MAPPING_TABLE,
  CanonicalMappingTable,
} from './canonical-mapping-table';
export type {
  NormalizedPoint,
  NormalizedSnapshot,
  RawTelemetryPoint,
} from './interfaces/normalized-point.interface';
