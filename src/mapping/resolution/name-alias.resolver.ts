import { Inject, Injectable } from '@nestjs/common';
import { compareCodePoints } from '../../common/compare';
import {
  ModelId,
  PROPRIETARY_MODEL,
  VendorVocabulary,
} from '../interfaces/canonical-mapping.interface';
import { RULE_TABLES, RuleTables } from '../rules/rule-tables';

/**
 * vsn300 names embed the SunSpec model: `m<model>_<instance>_<point>`,
 * or `m<model>_<point>` for the common model (`m1_Mn`).
 */
const VSN300_MODEL_PATTERN = /^m(\d+)_(?:(\d+)_)?(.+)$/;

export interface ResolvedName {
  /** Resolution key; becomes the canonical name */
  key: string;
  /** Name as it will be stored for the vocabulary (after spelling fixes) */
  vendorName: string;
  /** Model tags contributed by the name itself, sorted */
  models: ModelId[];
}

export interface AliasEntry {
  vsn700Name: string;
  canonicalName: string;
  model: ModelId;
}

/**
 * Name Alias Resolver
 *
 * Maps a vendor point name to its resolution key using only explicit
 * tables: the vsn700 alias map, the vsn700 spelling map and the
 * vsn300 model prefix. No similarity matching.
 */
@Injectable()
export class NameAliasResolver {
  private readonly proprietary: ReadonlySet<string>;

  constructor(@Inject(RULE_TABLES) private readonly rules: RuleTables) {
    this.proprietary = new Set(rules.nameAliases.proprietaryPoints);
  }

  resolve(vocabulary: VendorVocabulary, pointName: string): ResolvedName {
    return vocabulary === 'vsn300'
      ? this.resolveVsn300(pointName)
      : this.resolveVsn700(pointName);
  }

  /**
   * All vsn700 aliases in name order
   */
  aliases(): AliasEntry[] {
    return Object.entries(this.rules.nameAliases.aliases)
      .map(([vsn700Name, alias]) => ({
        vsn700Name,
        canonicalName: alias.canonical,
        model: alias.model,
      }))
      .sort((a, b) => compareCodePoints(a.vsn700Name, b.vsn700Name));
  }

  /**
   * Apply the vsn700 alternate-spelling table (`TSoc` -> `Soc`)
   */
  normalizeVsn700Spelling(pointName: string): string {
    return this.rules.nameAliases.vsn700Spellings[pointName] ?? pointName;
  }

  private resolveVsn300(pointName: string): ResolvedName {
    const match = VSN300_MODEL_PATTERN.exec(pointName);
    if (!match) {
      return this.withProprietaryTag({
        key: pointName,
        vendorName: pointName,
        models: [],
      });
    }

    return this.withProprietaryTag({
      key: match[3],
      vendorName: pointName,
      models: [`M${Number(match[1])}`],
    });
  }

  private resolveVsn700(pointName: string): ResolvedName {
    const vendorName = this.normalizeVsn700Spelling(pointName);
    const alias = this.rules.nameAliases.aliases[vendorName];
    if (alias) {
      return this.withProprietaryTag({
        key: alias.canonical,
        vendorName,
        models: [alias.model],
      });
    }
    return this.withProprietaryTag({ key: vendorName, vendorName, models: [] });
  }

  private withProprietaryTag(resolved: ResolvedName): ResolvedName {
    if (
      this.proprietary.has(resolved.key) ||
      this.proprietary.has(resolved.vendorName)
    ) {
      return {
        ...resolved,
        models: [...resolved.models, PROPRIETARY_MODEL].sort(),
      };
    }
    return resolved;
  }
}
