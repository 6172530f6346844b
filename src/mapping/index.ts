// Re-export public API
export { MappingModule } from './mapping.module';
export { MappingBuildService } from './mapping-build.service';
export type {
  MappingBuildOptions,
  MappingBuildResult,
} from './mapping-build.service';
export { NameAliasResolver } from './resolution/name-alias.resolver';
export { readArtifact, parseArtifact } from './artifact/mapping-artifact';
export type { MappingArtifact } from './artifact/mapping-artifact';
export { VENDOR_VOCABULARIES } from './interfaces/canonical-mapping.interface';
export type {
  CanonicalMappingEntry,
  VendorVocabulary,
} from './interfaces/canonical-mapping.interface';
