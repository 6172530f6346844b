import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TransformFailure } from '../common/errors';
import { NormalizationIssue } from '../common/issues';
import { RawSnapshot } from '../common/raw-snapshot.schema';
import { VendorVocabulary } from '../mapping/interfaces/canonical-mapping.interface';
import {
  CANONICAL_MAPPING_TABLE,
  CanonicalMappingTable,
} from './canonical-mapping-table';
import {
  NormalizedPoint,
  NormalizedSnapshot,
  RawTelemetryPoint,
} from './interfaces/normalized-point.interface';
import {
  TransformOutput,
  ValueTransformRegistry,
} from './transforms/value-transforms';

/** Raw point carrying the datalogger serial number */
const SERIAL_NUMBER_POINT = 'sn';

/**
 * NormalizerService - runtime normalization of datalogger snapshots
 *
 * Per raw point, in order:
 * 1. Lookup: vocabulary name to canonical entry (unknown points skipped)
 * 2. Collision: the first emitted point for a canonical name wins
 * 3. Transform: unit scaling, scale fixes, epoch and state-code rules
 * 4. Populate: metadata and compatibility flags from the entry
 * 5. Timestamp: poll time, or the device clock when the rule supplies one
 *
 * Synchronous, no I/O, no state kept between calls.
 */
@Injectable()
export class NormalizerService {
  private readonly logger = new Logger(NormalizerService.name);
  private readonly transforms: ValueTransformRegistry;

  constructor(
    @Inject(CANONICAL_MAPPING_TABLE)
    private readonly table: CanonicalMappingTable,
    configService: ConfigService,
  ) {
    this.transforms = new ValueTransformRegistry({
      temperatureThreshold: configService.get<number>(
        'TEMPERATURE_PLAUSIBILITY_THRESHOLD',
        70,
      ),
    });
  }

  normalize(
    vocabulary: VendorVocabulary,
    deviceId: string,
    rawPoints: readonly RawTelemetryPoint[],
    pollTime: Date = new Date(),
  ): NormalizedSnapshot {
    const points: NormalizedPoint[] = [];
    const issues: NormalizationIssue[] = [];
    const sourceOf = new Map<string, string>();
    const unknown: string[] = [];

    for (const raw of rawPoints) {
      const entry = this.table.lookup(vocabulary, raw.name);
      if (!entry) {
        unknown.push(raw.name);
        issues.push({
          kind: 'unknown-point',
          deviceId,
          pointName: raw.name,
          vocabulary,
        });
        continue;
      }

      const kept = sourceOf.get(entry.canonicalName);
      if (kept !== undefined) {
        issues.push({
          kind: 'duplicate-canonical',
          deviceId,
          canonicalName: entry.canonicalName,
          keptPointName: kept,
          droppedPointName: raw.name,
        });
        this.logger.debug(
          `Device ${deviceId}: ${raw.name} and ${kept} both map to ${entry.canonicalName}; keeping ${kept}`,
        );
        continue;
      }

      let transformed: TransformOutput;
      try {
        transformed = this.transforms.apply(raw.value, { entry, vocabulary });
      } catch (error) {
        if (!(error instanceof TransformFailure)) {
          throw error;
        }
        issues.push({
          kind: 'transform-failure',
          deviceId,
          pointName: raw.name,
          canonicalName: entry.canonicalName,
          message: error.message,
        });
        this.logger.warn(
          `Device ${deviceId}: dropped ${raw.name}: ${error.message}`,
        );
        continue;
      }
      sourceOf.set(entry.canonicalName, raw.name);

      points.push(
        Object.freeze({
          deviceId,
          canonicalName: entry.canonicalName,
          sourceName: raw.name,
          value: transformed.value,
          ...(transformed.rawCode !== undefined
            ? { rawCode: transformed.rawCode }
            : {}),
          unit: transformed.unit ?? entry.unit,
          label: entry.label,
          displayName: entry.displayName,
          description: entry.description,
          category: entry.category,
          ...(entry.deviceClass ? { deviceClass: entry.deviceClass } : {}),
          ...(entry.stateClass ? { stateClass: entry.stateClass } : {}),
          ...(entry.entityCategory
            ? { entityCategory: entry.entityCategory }
            : {}),
          ...(entry.icon ? { icon: entry.icon } : {}),
          models: entry.models,
          compatibleWithVsn300: entry.vsn300Name !== undefined,
          compatibleWithVsn700: entry.vsn700Name !== undefined,
          timestamp: (transformed.timestamp ?? pollTime).toISOString(),
        }),
      );
    }

    if (unknown.length > 0) {
      this.logger.debug(
        `Device ${deviceId}: ${unknown.length} unmapped points: ${unknown.join(', ')}`,
      );
    }
    return { deviceId, points, issues };
  }

  /**
   * Normalize every device of a `/livedata` snapshot. Devices reported
   * under a MAC address are renamed to the serial number in their `sn`
   * point.
   */
  normalizeSnapshot(
    vocabulary: VendorVocabulary,
    snapshot: RawSnapshot,
    pollTime: Date = new Date(),
  ): NormalizedSnapshot[] {
    const results: NormalizedSnapshot[] = [];

    for (const [reportedId, device] of Object.entries(snapshot)) {
      if (!device.points) {
        this.logger.debug(`Device ${reportedId} reported no points; skipped`);
        continue;
      }
      const rawPoints = device.points.map((point) => ({
        name: point.name,
        value: point.value,
      }));
      results.push(
        this.normalize(
          vocabulary,
          this.resolveDeviceId(reportedId, rawPoints),
          rawPoints,
          pollTime,
        ),
      );
    }

    const pointCount = results.reduce((sum, r) => sum + r.points.length, 0);
    const issueCount = results.reduce((sum, r) => sum + r.issues.length, 0);
    this.logger.log(
      `Normalized ${results.length} device(s): ${pointCount} points, ${issueCount} issues`,
    );
    return results;
  }

  private resolveDeviceId(
    reportedId: string,
    rawPoints: readonly RawTelemetryPoint[],
  ): string {
    if (!reportedId.includes(':')) {
      return reportedId;
    }
    const serial = rawPoints.find(
      (point) => point.name === SERIAL_NUMBER_POINT,
    )?.value;
    return typeof serial === 'string' || typeof serial === 'number'
      ? String(serial)
      : reportedId;
  }
}
