import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { compareCodePoints } from '../../common/compare';
import { UnresolvedPointWarning } from '../../common/issues';
import {
  CanonicalMappingEntry,
  ModelId,
  VENDOR_ONLY_MODELS,
  VENDOR_VOCABULARIES,
  VendorVocabulary,
} from '../interfaces/canonical-mapping.interface';
import {
  MappingSources,
  StandardsDefinition,
  VendorPointRecord,
} from '../interfaces/source-records.interface';
import { RULE_TABLES, RuleTables } from '../rules/rule-tables';
import { resolveCategory } from './category-resolver';
import {
  DescriptionCandidate,
  DescriptionResolver,
  FeedTitleSource,
} from './description-resolver';
import { generateLabel } from './label-generator';
import { NameAliasResolver } from './name-alias.resolver';
import { UnitInference, inferUnit } from './unit-inference';

/**
 * Resolution result: entries sorted by canonical name, plus non-fatal
 * warnings and counters for the build summary.
 */
export interface ResolutionResult {
  entries: CanonicalMappingEntry[];
  warnings: UnresolvedPointWarning[];
  stats: ResolutionStats;
}

export interface ResolutionStats {
  vendorRecords: number;
  standardsDefinitions: number;
  /** Definitions no vendor record referenced; counted, never emitted */
  unreferencedDefinitions: number;
  groups: number;
  orphaned: number;
  /** Groups folded into another by case-insensitive deduplication */
  merged: number;
}

interface GroupMember {
  vendorName: string;
  record: VendorPointRecord;
}

/**
 * A standards definition attached to a group. `repeatIndex` is set when
 * a repeating-group point (`DCA_1`) matched its base definition (`DCA`).
 */
interface JoinedDefinition {
  definition: StandardsDefinition;
  repeatIndex?: string;
}

interface PointGroup {
  key: string;
  models: Set<ModelId>;
  members: Record<VendorVocabulary, GroupMember[]>;
  standards: JoinedDefinition[];
}

const PUBLISHED_MODEL = /^M\d+$/;
const REPEATING_POINT = /^(.+)_(\d+)$/;

const ORIGIN_RANK: Record<StandardsDefinition['origin'], number> = {
  sunspec: 0,
  'vendor-extension': 1,
};

const DESCRIPTION_RANK: Record<DescriptionCandidate['tier'], number> = {
  standards: 3,
  'feed-title': 2,
  synthesized: 1,
  'label-fallback': 0,
};

const modelNumber = (model: ModelId) =>
  PUBLISHED_MODEL.test(model) ? Number(model.slice(1)) : Number.MAX_VALUE;

/**
 * Model tags ordered numerically for published models, then by name
 */
export function compareModels(a: ModelId, b: ModelId): number {
  return modelNumber(a) - modelNumber(b) || compareCodePoints(a, b);
}

/**
 * MappingResolutionService - the build-time conflict resolver
 *
 * Reconciles the two vendor vocabularies and both standards workbooks
 * into canonical entries:
 * 1. every vendor record is keyed through the alias resolver
 * 2. records sharing a key form one group; standards definitions join
 *    a group through a model tag it already carries (vendor-extension
 *    definitions also by bare point name)
 * 3. models are the union of all tags; untagged groups are vendor-only
 * 4. label, category, description and unit are resolved per group
 * 5. groups whose keys differ only by case are merged
 *
 * Pure with respect to its inputs: the same sources give the same
 * entries in the same order.
 */
@Injectable()
export class MappingResolutionService {
  private readonly logger = new Logger(MappingResolutionService.name);
  private readonly descriptions: DescriptionResolver;

  constructor(
    @Inject(RULE_TABLES) rules: RuleTables,
    private readonly aliasResolver: NameAliasResolver,
    configService: ConfigService,
  ) {
    this.descriptions = new DescriptionResolver(rules.descriptions, {
      minLength: configService.get<number>('FEED_TITLE_MIN_LENGTH', 10),
      minWords: configService.get<number>('FEED_TITLE_MIN_WORDS', 2),
    });
  }

  resolve(sources: MappingSources): ResolutionResult {
    const warnings: UnresolvedPointWarning[] = [];
    const groups = this.groupRecords(sources.vendorRecords);
    const referenced = this.joinStandards(groups, sources.standards);

    const entries: CanonicalMappingEntry[] = [];
    let orphaned = 0;

    for (const group of groups) {
      const occurs = VENDOR_VOCABULARIES.some((vocabulary) =>
        group.members[vocabulary].some(
          ({ record }) => record.inLivedata || record.inFeeds || record.inStatus,
        ),
      );
      if (group.models.size === 0 && !occurs) {
        orphaned++;
        warnings.push({
          kind: 'unresolved-point',
          key: group.key,
          reason: 'orphaned',
          message: `Point '${group.key}' has no model tag and no feed occurrence; dropped`,
        });
        continue;
      }

      const entry = this.buildEntry(group);
      if (entry.needsReview) {
        warnings.push({
          kind: 'unresolved-point',
          key: entry.canonicalName,
          reason: 'unknown-category',
          message: `Point '${entry.canonicalName}' (models ${entry.models.join(', ')}) has no determinable category; flagged for review`,
        });
      }
      entries.push(entry);
    }

    const deduplicated = this.deduplicate(entries);
    const stats: ResolutionStats = {
      vendorRecords: sources.vendorRecords.length,
      standardsDefinitions: sources.standards.length,
      unreferencedDefinitions: sources.standards.length - referenced.size,
      groups: groups.length,
      orphaned,
      merged: entries.length - deduplicated.length,
    };

    this.logger.log(
      `Resolved ${deduplicated.length} canonical points from ${stats.vendorRecords} vendor records ` +
        `(${stats.orphaned} orphaned, ${stats.merged} merged, ${stats.unreferencedDefinitions} unreferenced definitions)`,
    );

    return { entries: deduplicated, warnings, stats };
  }

  /**
   * Steps 1-2: key every vendor record and group by key
   */
  private groupRecords(records: readonly VendorPointRecord[]): PointGroup[] {
    const groups = new Map<string, PointGroup>();

    for (const record of records) {
      const resolved = this.aliasResolver.resolve(
        record.vocabulary,
        record.pointName,
      );
      const group: PointGroup = groups.get(resolved.key) ?? {
        key: resolved.key,
        models: new Set(),
        members: { vsn300: [], vsn700: [] },
        standards: [],
      };
      groups.set(resolved.key, group);
      resolved.models.forEach((model) => group.models.add(model));
      group.members[record.vocabulary].push({
        vendorName: resolved.vendorName,
        record,
      });
    }

    return [...groups.values()].sort((a, b) => compareCodePoints(a.key, b.key));
  }

  /**
   * Attach standards definitions to groups.
   *
   * @returns the definitions that joined at least one group
   */
  private joinStandards(
    groups: readonly PointGroup[],
    definitions: readonly StandardsDefinition[],
  ): Set<StandardsDefinition> {
    const byModelPoint = new Map<string, StandardsDefinition>();
    const vendorExtensionByPoint = new Map<string, StandardsDefinition>();
    for (const definition of definitions) {
      const key = `${definition.modelId}/${definition.pointName}`;
      if (!byModelPoint.has(key)) {
        byModelPoint.set(key, definition);
      }
      if (
        definition.origin === 'vendor-extension' &&
        !vendorExtensionByPoint.has(definition.pointName)
      ) {
        vendorExtensionByPoint.set(definition.pointName, definition);
      }
    }

    const referenced = new Set<StandardsDefinition>();
    for (const group of groups) {
      const extension = vendorExtensionByPoint.get(group.key);
      if (extension) {
        group.models.add(extension.modelId);
      }

      const repeating = REPEATING_POINT.exec(group.key);
      for (const model of [...group.models].sort(compareModels)) {
        const exact = byModelPoint.get(`${model}/${group.key}`);
        if (exact) {
          group.standards.push({ definition: exact });
          continue;
        }
        const base = repeating
          ? byModelPoint.get(`${model}/${repeating[1]}`)
          : undefined;
        if (base && repeating) {
          group.standards.push({ definition: base, repeatIndex: repeating[2] });
        }
      }

      group.standards.sort(
        (a, b) =>
          ORIGIN_RANK[a.definition.origin] - ORIGIN_RANK[b.definition.origin] ||
          compareModels(a.definition.modelId, b.definition.modelId),
      );
      group.standards.forEach(({ definition }) => referenced.add(definition));
    }
    return referenced;
  }

  private buildEntry(group: PointGroup): CanonicalMappingEntry {
    const vsn300Name = this.pickVendorName(group, 'vsn300');
    const vsn700Name = this.pickVendorName(group, 'vsn700');

    const vendorOnly = group.models.size === 0;
    const models = vendorOnly
      ? VENDOR_VOCABULARIES.filter(
          (vocabulary) => group.members[vocabulary].length > 0,
        ).map((vocabulary) => VENDOR_ONLY_MODELS[vocabulary])
      : [...group.models];
    models.sort(compareModels);

    const records = [...group.members.vsn300, ...group.members.vsn700].map(
      ({ record }) => record,
    );
    const label = this.resolveLabel(group, records, vsn300Name, vsn700Name);

    const feedTitles: FeedTitleSource[] = records.flatMap((record) =>
      record.feedTitle
        ? [
            {
              vocabulary: record.vocabulary,
              pointName: record.pointName,
              title: record.feedTitle,
            },
          ]
        : [],
    );
    const standards = group.standards
      .map((joined) => ({
        description: this.withRepeatSuffix(
          joined.definition.description,
          joined.repeatIndex,
          'description',
        ),
        modelId: joined.definition.modelId,
      }))
      .find((candidate) => this.descriptions.isUsableStandardsText(candidate));

    const primary = this.descriptions.resolvePrimary({
      canonicalName: group.key,
      standards,
      feedTitles,
    });
    const category = resolveCategory({
      label,
      description: primary?.text ?? '',
      models,
      vsn700Name,
    });
    const description = primary ?? this.descriptions.resolve({
      canonicalName: group.key,
      feedTitles: [],
      label,
      category,
      models,
    });

    const unit = this.resolveUnit(group, records);
    const showDescription =
      description.tier === 'standards' ||
      description.tier === 'feed-title' ||
      (description.tier === 'synthesized' && description.curated);

    return {
      canonicalName: group.key,
      models,
      vendorOnly,
      ...(vsn300Name ? { vsn300Name } : {}),
      ...(vsn700Name ? { vsn700Name } : {}),
      label,
      description: description.text,
      descriptionSource: description.tier,
      displayName: showDescription ? description.text : label,
      category,
      unit: unit.unit,
      ...(unit.deviceClass ? { deviceClass: unit.deviceClass } : {}),
      ...(unit.stateClass ? { stateClass: unit.stateClass } : {}),
      inVsn300Feed: group.members.vsn300.length > 0,
      inVsn700Feed: group.members.vsn700.length > 0,
      availableInWireProtocol: models.some((model) =>
        PUBLISHED_MODEL.test(model),
      ),
      needsReview: category === 'Unknown',
    };
  }

  /**
   * One name per vocabulary. vsn300 prefers the three-phase inverter
   * model (`m103_`), which the runtime falls back to for `m101_`/`m102_`.
   */
  private pickVendorName(
    group: PointGroup,
    vocabulary: VendorVocabulary,
  ): string | undefined {
    const names = [
      ...new Set(group.members[vocabulary].map((member) => member.vendorName)),
    ].sort(
      (a, b) =>
        Number(!a.startsWith('m103_')) - Number(!b.startsWith('m103_')) ||
        compareCodePoints(a, b),
    );
    if (names.length > 1) {
      this.logger.debug(
        `Group ${group.key}: keeping ${vocabulary} name ${names[0]}, shadowing ${names.slice(1).join(', ')}`,
      );
    }
    return names[0];
  }

  private resolveLabel(
    group: PointGroup,
    records: readonly VendorPointRecord[],
    vsn300Name: string | undefined,
    vsn700Name: string | undefined,
  ): string {
    const standards = group.standards.find(
      ({ definition }) => definition.label.trim() !== '',
    );
    if (standards) {
      return this.withRepeatSuffix(
        standards.definition.label.trim(),
        standards.repeatIndex,
        'label',
      );
    }
    const statusLabel = records.find((record) => record.statusLabel)?.statusLabel;
    if (statusLabel) {
      return statusLabel;
    }
    return generateLabel(vsn700Name ?? vsn300Name ?? group.key);
  }

  /**
   * Standards unit beats feed unit; the open standard beats the vendor
   * extension (already the order of `group.standards`).
   */
  private resolveUnit(
    group: PointGroup,
    records: readonly VendorPointRecord[],
  ): UnitInference {
    const standardsUnit = group.standards.find(
      ({ definition }) => definition.unit.trim() !== '',
    )?.definition.unit;
    if (standardsUnit) {
      return inferUnit(standardsUnit);
    }
    const feedUnit = records.find((record) => record.feedUnit)?.feedUnit;
    return inferUnit(feedUnit);
  }

  private withRepeatSuffix(
    text: string,
    repeatIndex: string | undefined,
    field: 'label' | 'description',
  ): string {
    if (!repeatIndex || text.trim() === '') {
      return text;
    }
    return field === 'label'
      ? `${text} #${repeatIndex}`
      : `${text} for string ${repeatIndex}`;
  }

  /**
   * Step 5: merge entries whose canonical names differ only by case.
   * The richer entry (device class, stronger description tier) is the
   * base; the other contributes models and missing vendor names.
   */
  private deduplicate(
    entries: readonly CanonicalMappingEntry[],
  ): CanonicalMappingEntry[] {
    const byFoldedName = new Map<string, CanonicalMappingEntry>();

    for (const entry of entries) {
      const folded = entry.canonicalName.toLowerCase();
      const existing = byFoldedName.get(folded);
      if (!existing) {
        byFoldedName.set(folded, entry);
        continue;
      }

      const [base, other] =
        this.richness(entry) > this.richness(existing) ||
        (this.richness(entry) === this.richness(existing) &&
          compareCodePoints(entry.canonicalName, existing.canonicalName) < 0)
          ? [entry, existing]
          : [existing, entry];
      this.logger.debug(
        `Merging '${other.canonicalName}' into '${base.canonicalName}'`,
      );
      byFoldedName.set(folded, this.mergeEntries(base, other));
    }

    return [...byFoldedName.values()].sort((a, b) =>
      compareCodePoints(a.canonicalName, b.canonicalName),
    );
  }

  private richness(entry: CanonicalMappingEntry): number {
    return (
      (entry.deviceClass ? 4 : 0) +
      DESCRIPTION_RANK[entry.descriptionSource] +
      (entry.unit ? 1 : 0)
    );
  }

  private mergeEntries(
    base: CanonicalMappingEntry,
    other: CanonicalMappingEntry,
  ): CanonicalMappingEntry {
    const union = [...new Set([...base.models, ...other.models])];
    const pseudo: readonly ModelId[] = Object.values(VENDOR_ONLY_MODELS);
    const tagged = union.filter((model) => !pseudo.includes(model));
    const models = (tagged.length > 0 ? tagged : union).sort(compareModels);

    const vsn300Name = base.vsn300Name ?? other.vsn300Name;
    const vsn700Name = base.vsn700Name ?? other.vsn700Name;

    return {
      ...base,
      models,
      vendorOnly: tagged.length === 0,
      ...(vsn300Name ? { vsn300Name } : {}),
      ...(vsn700Name ? { vsn700Name } : {}),
      inVsn300Feed: base.inVsn300Feed || other.inVsn300Feed,
      inVsn700Feed: base.inVsn700Feed || other.inVsn700Feed,
      availableInWireProtocol: models.some((model) =>
        PUBLISHED_MODEL.test(model),
      ),
    };
  }
}
