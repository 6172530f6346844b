import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RULE_TABLES, RuleTables } from '../mapping/rules/rule-tables';
import { RulesModule } from '../mapping/rules/rules.module';
import {
  CANONICAL_MAPPING_TABLE,
  CanonicalMappingTable,
} from './canonical-mapping-table';
import { NormalizationController } from './normalization.controller';
import { NormalizerService } from './normalizer.service';

/**
 * NormalizationModule
 *
 * Runtime side: loads the Canonical Mapping Table artifact once at
 * startup and normalizes raw snapshots against it.
 *
 * Components:
 * - NormalizationController: REST API for snapshot normalization
 * - NormalizerService: per-point lookup, transform and population
 * - CANONICAL_MAPPING_TABLE: frozen table read from MAPPING_ARTIFACT_PATH
 */
@Module({
  imports: [RulesModule],
  controllers: [NormalizationController],
  providers: [
    {
      provide: CANONICAL_MAPPING_TABLE,
      useFactory: (configService: ConfigService, rules: RuleTables) =>
        CanonicalMappingTable.load(
          configService.get<string>(
            'MAPPING_ARTIFACT_PATH',
            'data/mapping/canonical-point-mapping.json',
          ),
          rules.nameAliases.vsn700Spellings,
        ),
      inject: [ConfigService, RULE_TABLES],
    },
    NormalizerService,
  ],
  exports: [NormalizerService, CANONICAL_MAPPING_TABLE],
})
export class NormalizationModule {}
