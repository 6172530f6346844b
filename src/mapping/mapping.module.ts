import { Module } from '@nestjs/common';
import { StandardsWorkbookLoader } from './loaders/standards-workbook.loader';
import { TelemetryCaptureLoader } from './loaders/telemetry-capture.loader';
import { MappingBuildService } from './mapping-build.service';
import { MappingResolutionService } from './resolution/mapping-resolution.service';
import { NameAliasResolver } from './resolution/name-alias.resolver';
import { RulesModule } from './rules/rules.module';

/**
 * MappingModule
 *
 * Offline build of the Canonical Mapping Table.
 *
 * Components:
 * - TelemetryCaptureLoader: vendor livedata/feeds/status captures
 * - StandardsWorkbookLoader: SunSpec and vendor-extension workbooks
 * - NameAliasResolver: vendor name to resolution key
 * - MappingResolutionService: grouping, joining and classification
 * - MappingBuildService: load, resolve, correct and persist
 */
@Module({
  imports: [RulesModule],
  providers: [
    TelemetryCaptureLoader,
    StandardsWorkbookLoader,
    NameAliasResolver,
    MappingResolutionService,
    MappingBuildService,
  ],
  exports: [MappingBuildService, NameAliasResolver],
})
export class MappingModule {}
