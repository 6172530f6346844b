import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Inject,
  Logger,
  Param,
  Post,
} from '@nestjs/common';
import { z } from 'zod';
import { RawSnapshotSchema } from '../common/raw-snapshot.schema';
import { VENDOR_VOCABULARIES } from '../mapping/interfaces/canonical-mapping.interface';
import {
  CANONICAL_MAPPING_TABLE,
  CanonicalMappingTable,
  MappingTableSummary,
} from './canonical-mapping-table';
import { NormalizedSnapshot } from './interfaces/normalized-point.interface';
import { NormalizerService } from './normalizer.service';

const VocabularySchema = z.enum(VENDOR_VOCABULARIES);

/**
 * Response DTO for the normalize endpoint
 */
export interface NormalizeResponse {
  vocabulary: string;
  rulesVersion: string;
  devices: NormalizedSnapshot[];
}

/**
 * NormalizationController
 *
 * Usage:
 *   POST /normalize/vsn700
 *   Content-Type: application/json
 *   Body: { "<deviceId>": { "points": [{ "name": "Pgrid", "value": 8524 }] } }
 *
 *   GET /normalize/mapping
 */
@Controller('normalize')
export class NormalizationController {
  private readonly logger = new Logger(NormalizationController.name);

  constructor(
    private readonly normalizerService: NormalizerService,
    @Inject(CANONICAL_MAPPING_TABLE)
    private readonly table: CanonicalMappingTable,
  ) {}

  /**
   * Summary of the loaded mapping table
   *
   * @example
   * GET /normalize/mapping -> { rulesVersion, pointCount, categories, ... }
   */
  @Get('mapping')
  getMapping(): MappingTableSummary {
    return this.table.summary();
  }

  /**
   * Normalize a raw `/livedata` snapshot
   */
  @Post(':vocabulary')
  @HttpCode(200)
  normalize(
    @Param('vocabulary') vocabulary: string,
    @Body() body: unknown,
  ): NormalizeResponse {
    const parsedVocabulary = VocabularySchema.safeParse(vocabulary);
    if (!parsedVocabulary.success) {
      throw new BadRequestException(
        `Unknown vocabulary '${vocabulary}'. Expected one of: ${VENDOR_VOCABULARIES.join(', ')}`,
      );
    }

    const snapshot = RawSnapshotSchema.safeParse(body);
    if (!snapshot.success) {
      const issue = snapshot.error.issues[0];
      throw new BadRequestException(
        `Invalid snapshot at '${issue.path.join('.') || '(root)'}': ${issue.message}`,
      );
    }

    this.logger.log(
      `Normalize request: vocabulary=${parsedVocabulary.data}, devices=${Object.keys(snapshot.data).length}`,
    );
    return {
      vocabulary: parsedVocabulary.data,
      rulesVersion: this.table.rulesVersion,
      devices: this.normalizerService.normalizeSnapshot(
        parsedVocabulary.data,
        snapshot.data,
      ),
    };
  }
}
