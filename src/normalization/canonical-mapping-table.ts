import { compareCodePoints } from '../common/compare';
import {
  CanonicalMappingEntry,
  VENDOR_VOCABULARIES,
  VendorVocabulary,
} from '../mapping/interfaces/canonical-mapping.interface';
import {
  MappingArtifact,
  readArtifact,
} from '../mapping/artifact/mapping-artifact';
import { deepFreeze } from '../mapping/rules/rule-tables';

/** Injection token for the loaded table */
export const CANONICAL_MAPPING_TABLE = Symbol('CANONICAL_MAPPING_TABLE');

/**
 * vsn300 single- and split-phase inverter models report the same points
 * as the three-phase model.
 */
const VSN300_MODEL_FALLBACK = /^m10[12]_/;

/**
 * The Canonical Mapping Table, indexed for runtime lookups.
 *
 * Deeply frozen on construction; safe to share between concurrent
 * normalizations.
 */
export class CanonicalMappingTable {
  private readonly byCanonicalName: ReadonlyMap<string, CanonicalMappingEntry>;
  private readonly byVendorName: Readonly<
    Record<VendorVocabulary, ReadonlyMap<string, CanonicalMappingEntry>>
  >;

  constructor(
    readonly rulesVersion: string,
    entries: readonly CanonicalMappingEntry[],
    private readonly vsn700Spellings: Readonly<Record<string, string>> = {},
  ) {
    const frozen = deepFreeze(
      entries.map((entry) => ({ ...entry, models: [...entry.models] })),
    );
    this.byCanonicalName = new Map(
      frozen.map((entry) => [entry.canonicalName, entry]),
    );

    const index = (vocabulary: VendorVocabulary) =>
      new Map(
        frozen.flatMap((entry) => {
          const name =
            vocabulary === 'vsn300' ? entry.vsn300Name : entry.vsn700Name;
          return name ? [[name, entry] as const] : [];
        }),
      );
    this.byVendorName = {
      vsn300: index('vsn300'),
      vsn700: index('vsn700'),
    };
  }

  static fromArtifact(
    artifact: MappingArtifact,
    vsn700Spellings?: Readonly<Record<string, string>>,
  ): CanonicalMappingTable {
    return new CanonicalMappingTable(
      artifact.rulesVersion,
      artifact.points,
      vsn700Spellings,
    );
  }

  static async load(
    artifactPath: string,
    vsn700Spellings?: Readonly<Record<string, string>>,
  ): Promise<CanonicalMappingTable> {
    return CanonicalMappingTable.fromArtifact(
      await readArtifact(artifactPath),
      vsn700Spellings,
    );
  }

  get size(): number {
    return this.byCanonicalName.size;
  }

  entries(): CanonicalMappingEntry[] {
    return [...this.byCanonicalName.values()];
  }

  get(canonicalName: string): CanonicalMappingEntry | undefined {
    return this.byCanonicalName.get(canonicalName);
  }

  /**
   * Find the entry for a raw point name of the given vocabulary
   */
  lookup(
    vocabulary: VendorVocabulary,
    pointName: string,
  ): CanonicalMappingEntry | undefined {
    const index = this.byVendorName[vocabulary];
    if (vocabulary === 'vsn700') {
      return index.get(this.vsn700Spellings[pointName] ?? pointName);
    }
    return (
      index.get(pointName) ??
      (VSN300_MODEL_FALLBACK.test(pointName)
        ? index.get(`m103_${pointName.slice('m101_'.length)}`)
        : undefined)
    );
  }

  /**
   * Entries a device of this vocabulary can report, in canonical name order
   */
  expectedPoints(vocabulary: VendorVocabulary): CanonicalMappingEntry[] {
    return [...this.byVendorName[vocabulary].values()].sort((a, b) =>
      compareCodePoints(a.canonicalName, b.canonicalName),
    );
  }

  /**
   * Name of the same point in the other vocabulary
   *
   * @example
   * table.crossReference('vsn300', 'm103_1_W') // 'Pgrid'
   */
  crossReference(
    vocabulary: VendorVocabulary,
    pointName: string,
  ): string | undefined {
    const entry = this.lookup(vocabulary, pointName);
    return vocabulary === 'vsn300' ? entry?.vsn700Name : entry?.vsn300Name;
  }

  /**
   * Entry counts per category and vocabulary
   */
  summary(): MappingTableSummary {
    const categories: Record<string, number> = {};
    const vocabularies = Object.fromEntries(
      VENDOR_VOCABULARIES.map((vocabulary) => [
        vocabulary,
        this.byVendorName[vocabulary].size,
      ]),
    );
    for (const entry of this.byCanonicalName.values()) {
      categories[entry.category] = (categories[entry.category] ?? 0) + 1;
    }
    return {
      rulesVersion: this.rulesVersion,
      pointCount: this.size,
      needsReview: this.entries().filter((entry) => entry.needsReview).length,
      categories,
      vocabularies,
    };
  }
}

export interface MappingTableSummary {
  rulesVersion: string;
  pointCount: number;
  needsReview: number;
  categories: Record<string, number>;
  vocabularies: Record<string, number>;
}
