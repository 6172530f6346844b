import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { compareCodePoints } from '../../common/compare';
import {
  SourceLoadError,
  formatErrorMessage,
  isMissingFile,
} from '../../common/errors';
import { RawSnapshotSchema } from '../../common/raw-snapshot.schema';
import { VendorVocabulary } from '../interfaces/canonical-mapping.interface';
import { VendorPointRecord } from '../interfaces/source-records.interface';
import { ISourceLoader } from './source-loader.interface';

export const LIVEDATA_FILE = 'livedata.json';
export const FEEDS_FILE = 'feeds.json';
export const STATUS_FILE = 'status.json';

const FeedsSchema = z
  .object({
    feeds: z.record(
      z
        .object({
          datastreams: z
            .record(
              z
                .object({
                  title: z.string().optional(),
                  units: z.string().optional(),
                })
                .passthrough(),
            )
            .optional(),
        })
        .passthrough(),
    ),
  })
  .passthrough();

const StatusSchema = z
  .object({
    keys: z.record(
      z
        .object({
          label: z.string().optional(),
          value: z.unknown().optional(),
        })
        .passthrough(),
    ),
  })
  .passthrough();

/**
 * Telemetry Capture Loader
 *
 * Reads one vocabulary's capture directory:
 * - livedata.json (required): `{deviceId: {points: [{name, value}]}}`
 * - feeds.json (optional): `{feeds: {id: {datastreams: {name: {title, units}}}}}`
 * - status.json (optional): `{keys: {"fw.release_number": {label, value}}}`
 *
 * Emits one record per distinct point name, sorted by name. Status keys
 * are flattened (`a.b` -> `a_b`). When several devices describe the same
 * point, the first device in id order supplies title, unit and label.
 */
@Injectable()
export class TelemetryCaptureLoader
  implements ISourceLoader<VendorVocabulary, VendorPointRecord>
{
  private readonly logger = new Logger(TelemetryCaptureLoader.name);

  readonly name = 'telemetry-capture';
  readonly description = 'Datalogger REST capture (livedata, feeds, status)';

  async load(
    vocabulary: VendorVocabulary,
    captureDir: string,
  ): Promise<VendorPointRecord[]> {
    const sourceName = `${vocabulary}-capture`;
    const records = new Map<string, VendorPointRecord>();
    const recordFor = (pointName: string): VendorPointRecord => {
      let record = records.get(pointName);
      if (!record) {
        record = {
          vocabulary,
          pointName,
          inLivedata: false,
          inFeeds: false,
          inStatus: false,
        };
        records.set(pointName, record);
      }
      return record;
    };

    const livedata = await this.readJson(
      sourceName,
      join(captureDir, LIVEDATA_FILE),
      RawSnapshotSchema,
    );
    if (livedata === null) {
      throw new SourceLoadError(
        sourceName,
        join(captureDir, LIVEDATA_FILE),
        'Required file not found',
      );
    }

    for (const deviceId of Object.keys(livedata).sort(compareCodePoints)) {
      const points = livedata[deviceId].points;
      if (!points) {
        this.logger.warn(`[${sourceName}] Device ${deviceId} has no points`);
        continue;
      }
      for (const point of points) {
        recordFor(point.name).inLivedata = true;
      }
    }

    const feeds = await this.readJson(
      sourceName,
      join(captureDir, FEEDS_FILE),
      FeedsSchema,
    );
    if (feeds) {
      for (const feedId of Object.keys(feeds.feeds).sort(compareCodePoints)) {
        const datastreams = feeds.feeds[feedId].datastreams ?? {};
        const pointNames = Object.keys(datastreams).sort(compareCodePoints);
        for (const pointName of pointNames) {
          const stream = datastreams[pointName];
          const record = recordFor(pointName);
          record.inFeeds = true;
          if (record.feedTitle === undefined && stream.title) {
            record.feedTitle = stream.title.trim();
          }
          if (record.feedUnit === undefined && stream.units) {
            record.feedUnit = stream.units.trim();
          }
        }
      }
    } else {
      this.logger.debug(`[${sourceName}] No ${FEEDS_FILE} in ${captureDir}`);
    }

    const status = await this.readJson(
      sourceName,
      join(captureDir, STATUS_FILE),
      StatusSchema,
    );
    if (status) {
      for (const key of Object.keys(status.keys).sort(compareCodePoints)) {
        const record = recordFor(key.replace(/\./g, '_'));
        record.inStatus = true;
        const label = status.keys[key].label?.trim();
        if (record.statusLabel === undefined && label) {
          record.statusLabel = label;
        }
      }
    } else {
      this.logger.debug(`[${sourceName}] No ${STATUS_FILE} in ${captureDir}`);
    }

    const result = [...records.values()].sort((a, b) =>
      compareCodePoints(a.pointName, b.pointName),
    );
    this.logger.log(
      `[${sourceName}] Loaded ${result.length} point names from ${captureDir}`,
    );
    return result;
  }

  /**
   * Read and validate a JSON file.
   *
   * @returns null when the file does not exist
   * @throws SourceLoadError when the file exists but is unreadable or invalid
   */
  private async readJson<T>(
    sourceName: string,
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | null> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new SourceLoadError(
        sourceName,
        filePath,
        `Cannot read file: ${formatErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new SourceLoadError(
        sourceName,
        filePath,
        `Invalid JSON: ${formatErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new SourceLoadError(
        sourceName,
        filePath,
        `Unexpected structure at '${issue.path.join('.')}': ${issue.message}`,
      );
    }
    return result.data;
  }
}
