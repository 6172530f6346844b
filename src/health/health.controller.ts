import { Controller, Get, Inject } from '@nestjs/common';
import {
  CANONICAL_MAPPING_TABLE,
  CanonicalMappingTable,
} from '../normalization/canonical-mapping-table';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  mapping: {
    pointCount: number;
    rulesVersion: string;
  };
}

@Controller('health')
export class HealthController {
  constructor(
    @Inject(CANONICAL_MAPPING_TABLE)
    private readonly table: CanonicalMappingTable,
  ) {}

  @Get()
  check(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      mapping: {
        pointCount: this.table.size,
        rulesVersion: this.table.rulesVersion,
      },
    };
  }
}
