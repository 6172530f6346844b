import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { z } from 'zod';
import {
  SourceLoadError,
  formatErrorMessage,
  isMissingFile,
} from '../../common/errors';
import {
  StandardsDefinition,
  StandardsOrigin,
} from '../interfaces/source-records.interface';
import { ISourceLoader } from './source-loader.interface';

export const WORKBOOK_HEADERS = [
  'Model',
  'Name',
  'Label',
  'Description',
  'Type',
  'Units',
  'SF',
] as const;

const cell = z
  .string()
  .optional()
  .transform((value) => (value ?? '').trim());

const WorkbookRowSchema = z.object({
  Model: z
    .string()
    .trim()
    .regex(/^M?\d+$/, 'expected a numeric model id such as 103 or M103'),
  Name: cell,
  Label: cell,
  Description: cell,
  Type: cell,
  Units: cell,
  SF: cell,
});

/**
 * Standards Workbook Loader
 *
 * Reads a tabular export of a point-definition workbook (one row per
 * point, header `Model,Name,Label,Description,Type,Units,SF`). Used for
 * both the open SunSpec model workbook and the vendor extension
 * workbook; `origin` tags every emitted definition.
 *
 * Rows with an empty Name (group separators in the spreadsheet) are
 * skipped. Model ids are normalized to the `M<number>` form.
 */
@Injectable()
export class StandardsWorkbookLoader
  implements ISourceLoader<StandardsOrigin, StandardsDefinition>
{
  private readonly logger = new Logger(StandardsWorkbookLoader.name);

  readonly name = 'standards-workbook';
  readonly description = 'Point-definition workbook CSV export';

  async load(
    origin: StandardsOrigin,
    csvPath: string,
  ): Promise<StandardsDefinition[]> {
    const sourceName = `${origin}-workbook`;

    let fileBuffer: Buffer;
    try {
      fileBuffer = await readFile(csvPath);
    } catch (error) {
      throw new SourceLoadError(
        sourceName,
        csvPath,
        isMissingFile(error)
          ? 'Required file not found'
          : `Cannot read file: ${formatErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    const definitions: StandardsDefinition[] = [];
    let rowNumber = 1; // header

    try {
      const stream = Readable.from(fileBuffer).pipe(
        csvParser({
          mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
          strict: true,
        }),
      );

      for await (const row of stream) {
        rowNumber++;
        const parsed = WorkbookRowSchema.safeParse(row);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          throw new SourceLoadError(
            sourceName,
            csvPath,
            `Row ${rowNumber}: column '${issue.path.join('.')}' ${issue.message}`,
          );
        }

        const { Model, Name, Label, Description, Type, Units, SF } =
          parsed.data;
        if (!Name) {
          continue;
        }

        definitions.push({
          origin,
          modelId: Model.startsWith('M') ? Model : `M${Model}`,
          pointName: Name,
          label: Label,
          description: Description,
          dataType: Type,
          unit: Units,
          ...(SF ? { scaleFactorRef: SF } : {}),
        });
      }
    } catch (error) {
      if (error instanceof SourceLoadError) {
        throw error;
      }
      throw new SourceLoadError(
        sourceName,
        csvPath,
        `Malformed CSV near row ${rowNumber}: ${formatErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    if (definitions.length === 0) {
      throw new SourceLoadError(
        sourceName,
        csvPath,
        `No point definitions found (expected header ${WORKBOOK_HEADERS.join(',')})`,
      );
    }

    this.logger.log(
      `[${sourceName}] Loaded ${definitions.length} definitions from ${csvPath}`,
    );
    return definitions;
  }
}
