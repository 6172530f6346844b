import { z } from 'zod';
import { deepFreeze } from '../../mapping/rules/rule-tables';
import stateCodesJson from './state-code-tables.json';

export const STATE_TABLES = ['global', 'dcdc', 'inverter', 'alarm'] as const;
export type StateTable = (typeof STATE_TABLES)[number];

const CodeTableSchema = z.record(z.string().regex(/^\d+$/), z.string().min(1));

const StateCodesSchema = z.object({
  version: z.string().min(1),
  tables: z.object({
    global: CodeTableSchema,
    dcdc: CodeTableSchema,
    inverter: CodeTableSchema,
    alarm: CodeTableSchema,
  }),
  /** Canonical point name -> code table */
  points: z.record(z.enum(STATE_TABLES)),
});

export type StateCodes = z.infer<typeof StateCodesSchema>;

export interface StateTranslation {
  text: string;
  code: number;
}

export function parseStateCodes(raw: unknown): StateCodes {
  return deepFreeze(StateCodesSchema.parse(raw));
}

/**
 * Operational and alarm code tables of the inverter firmware
 */
export class StateCodeTranslator {
  constructor(private readonly codes: StateCodes = parseStateCodes(stateCodesJson)) {}

  tableFor(canonicalName: string): StateTable | undefined {
    return this.codes.points[canonicalName];
  }

  /**
   * Codes missing from the table render as `Unknown (<code>)`
   */
  translate(table: StateTable, code: number): StateTranslation {
    return {
      text: this.codes.tables[table][String(code)] ?? `Unknown (${code})`,
      code,
    };
  }
}
