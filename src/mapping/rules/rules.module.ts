import { Module } from '@nestjs/common';
import { RULE_TABLES, loadRuleTables } from './rule-tables';

/**
 * RulesModule
 *
 * Loads the versioned rule documents once and shares the frozen result
 * with the build-time resolution engine and the runtime normalizer.
 */
@Module({
  providers: [{ provide: RULE_TABLES, useFactory: loadRuleTables }],
  exports: [RULE_TABLES],
})
export class RulesModule {}
