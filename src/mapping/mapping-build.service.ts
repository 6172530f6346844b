import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { join, resolve } from 'node:path';
import { BuildWarning } from '../common/issues';
import {
  MappingArtifact,
  createArtifact,
  writeArtifact,
} from './artifact/mapping-artifact';
import { CorrectionPipeline } from './corrections/correction-pipeline';
import { VENDOR_VOCABULARIES } from './interfaces/canonical-mapping.interface';
import { MappingSources } from './interfaces/source-records.interface';
import { StandardsWorkbookLoader } from './loaders/standards-workbook.loader';
import { TelemetryCaptureLoader } from './loaders/telemetry-capture.loader';
import {
  MappingResolutionService,
  ResolutionStats,
} from './resolution/mapping-resolution.service';
import { RULE_TABLES, RuleTables, rulesVersionOf } from './rules/rule-tables';

export const SUNSPEC_WORKBOOK = join('standards', 'sunspec-models.csv');
export const VENDOR_EXTENSION_WORKBOOK = join(
  'standards',
  'vendor-extension.csv',
);

export interface MappingBuildOptions {
  /** Defaults to MAPPING_SOURCES_DIR */
  sourcesDir?: string;
  /** Defaults to MAPPING_ARTIFACT_PATH */
  artifactPath?: string;
}

/**
 * Mapping Build Result Summary
 */
export interface MappingBuildResult {
  artifactPath: string;
  artifact: MappingArtifact;
  /** Serialized artifact exactly as written */
  content: string;
  warnings: BuildWarning[];
  stats: ResolutionStats & { correctedCount: number };
  durationMs: number;
}

/**
 * MappingBuildService - offline build of the Canonical Mapping Table
 *
 * 1. Load: both vendor captures and both standards workbooks
 * 2. Resolve: group, join and classify into canonical entries
 * 3. Correct: run the ordered correction passes
 * 4. Persist: write the sorted, timestamp-free JSON artifact
 *
 * A SourceLoadError aborts the build before anything is written.
 */
@Injectable()
export class MappingBuildService {
  private readonly logger = new Logger(MappingBuildService.name);
  private readonly pipeline: CorrectionPipeline;

  constructor(
    @Inject(RULE_TABLES) private readonly rules: RuleTables,
    private readonly captureLoader: TelemetryCaptureLoader,
    private readonly workbookLoader: StandardsWorkbookLoader,
    private readonly resolutionService: MappingResolutionService,
    private readonly configService: ConfigService,
  ) {
    this.pipeline = CorrectionPipeline.fromRules(rules.corrections);
  }

  async build(options: MappingBuildOptions = {}): Promise<MappingBuildResult> {
    const startTime = Date.now();
    const sourcesDir = resolve(
      options.sourcesDir ??
        this.configService.get<string>('MAPPING_SOURCES_DIR', 'data/sources'),
    );
    const artifactPath = resolve(
      options.artifactPath ??
        this.configService.get<string>(
          'MAPPING_ARTIFACT_PATH',
          'data/mapping/canonical-point-mapping.json',
        ),
    );

    this.logger.log(`Building canonical mapping from ${sourcesDir}`);
    const sources = await this.loadSources(sourcesDir);

    const resolution = this.resolutionService.resolve(sources);
    const corrections = this.pipeline.run(resolution.entries);
    const warnings: BuildWarning[] = [
      ...resolution.warnings,
      ...corrections.warnings,
    ];

    const artifact = createArtifact(
      corrections.entries,
      rulesVersionOf(this.rules),
    );
    const content = await writeArtifact(artifactPath, artifact);

    this.logWarnings(warnings);
    const durationMs = Date.now() - startTime;
    this.logger.log(
      `Wrote ${artifact.pointCount} points to ${artifactPath} in ${durationMs}ms (${warnings.length} warnings)`,
    );

    return {
      artifactPath,
      artifact,
      content,
      warnings,
      stats: { ...resolution.stats, correctedCount: corrections.correctedCount },
      durationMs,
    };
  }

  private async loadSources(sourcesDir: string): Promise<MappingSources> {
    const [captures, sunspec, vendorExtension] = await Promise.all([
      Promise.all(
        VENDOR_VOCABULARIES.map((vocabulary) =>
          this.captureLoader.load(vocabulary, join(sourcesDir, vocabulary)),
        ),
      ),
      this.workbookLoader.load('sunspec', join(sourcesDir, SUNSPEC_WORKBOOK)),
      this.workbookLoader.load(
        'vendor-extension',
        join(sourcesDir, VENDOR_EXTENSION_WORKBOOK),
      ),
    ]);

    return {
      vendorRecords: captures.flat(),
      standards: [...sunspec, ...vendorExtension],
    };
  }

  private logWarnings(warnings: readonly BuildWarning[]): void {
    const counts = new Map<string, number>();
    for (const warning of warnings) {
      counts.set(warning.kind, (counts.get(warning.kind) ?? 0) + 1);
      if (warning.kind === 'unresolved-point') {
        this.logger.warn(warning.message);
      } else {
        this.logger.debug(warning.message);
      }
    }
    for (const [kind, count] of counts) {
      this.logger.warn(`${count} ${kind} warning(s)`);
    }
  }
}
