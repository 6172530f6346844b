import {
  ModelId,
  PointCategory,
  VendorVocabulary,
} from '../interfaces/canonical-mapping.interface';
import { DescriptionRules } from '../rules/rule-tables';

export interface StandardsDescription {
  tier: 'standards';
  text: string;
  modelId: ModelId;
}

export interface FeedTitleDescription {
  tier: 'feed-title';
  text: string;
  vocabulary: VendorVocabulary;
}

export interface SynthesizedDescription {
  tier: 'synthesized';
  text: string;
  /** From the curated improvements table rather than the template */
  curated: boolean;
}

export interface LabelFallbackDescription {
  tier: 'label-fallback';
  text: string;
}

export type DescriptionCandidate =
  | StandardsDescription
  | FeedTitleDescription
  | SynthesizedDescription
  | LabelFallbackDescription;

export interface FeedTitleHeuristic {
  minLength: number;
  minWords: number;
}

export interface FeedTitleSource {
  vocabulary: VendorVocabulary;
  pointName: string;
  title: string;
}

export interface PrimaryDescriptionInputs {
  canonicalName: string;
  standards?: { description: string; modelId: ModelId };
  feedTitles: readonly FeedTitleSource[];
}

export interface DescriptionInputs extends PrimaryDescriptionInputs {
  label: string;
  category: PointCategory;
  models: readonly ModelId[];
}

const PUBLISHED_MODEL = /^M\d+$/;

/**
 * Description Resolver
 *
 * Short-circuiting chain, first accepted candidate wins:
 * 1. standards description, unless generic or common-model boilerplate
 * 2. vendor feed title, if it reads as a description
 * 3. synthesized: curated improvement text, else label + category + model
 * 4. the label itself
 */
export class DescriptionResolver {
  private readonly generic: ReadonlySet<string>;

  constructor(
    private readonly rules: DescriptionRules,
    private readonly heuristic: FeedTitleHeuristic,
  ) {
    this.generic = new Set(
      rules.genericDescriptions.map((text) => text.toLowerCase()),
    );
  }

  /**
   * Tiers 1 and 2 only; these texts also feed category resolution.
   */
  resolvePrimary(
    inputs: PrimaryDescriptionInputs,
  ): StandardsDescription | FeedTitleDescription | null {
    if (inputs.standards && this.isUsableStandardsText(inputs.standards)) {
      return {
        tier: 'standards',
        text: inputs.standards.description.trim(),
        modelId: inputs.standards.modelId,
      };
    }

    for (const feed of inputs.feedTitles) {
      if (this.isDescriptiveTitle(feed, inputs.canonicalName)) {
        return {
          tier: 'feed-title',
          text: feed.title.trim(),
          vocabulary: feed.vocabulary,
        };
      }
    }
    return null;
  }

  resolve(inputs: DescriptionInputs): DescriptionCandidate {
    return (
      this.resolvePrimary(inputs) ??
      this.synthesize(inputs) ?? { tier: 'label-fallback', text: inputs.label }
    );
  }

  isUsableStandardsText(standards: {
    description: string;
    modelId: ModelId;
  }): boolean {
    const text = standards.description.trim();
    if (text === '' || this.generic.has(text.toLowerCase())) {
      return false;
    }
    const boilerplate = this.rules.commonModelBoilerplate;
    return !(
      standards.modelId === boilerplate.model &&
      text.toLowerCase().includes(boilerplate.phrase.toLowerCase())
    );
  }

  /**
   * A feed title counts as a description when it is not just the point
   * name echoed back and clears the length and word-count thresholds.
   */
  isDescriptiveTitle(feed: FeedTitleSource, canonicalName: string): boolean {
    const title = feed.title.trim();
    const lower = title.toLowerCase();
    if (
      title === '' ||
      this.generic.has(lower) ||
      lower === feed.pointName.toLowerCase() ||
      lower === canonicalName.toLowerCase()
    ) {
      return false;
    }
    const words = title.split(/\s+/).filter((word) => word.length > 0);
    return (
      title.length >= this.heuristic.minLength &&
      words.length >= this.heuristic.minWords
    );
  }

  private synthesize(inputs: DescriptionInputs): SynthesizedDescription | null {
    const curated = this.rules.improvements[inputs.canonicalName];
    if (curated) {
      return { tier: 'synthesized', text: curated, curated: true };
    }
    if (inputs.category === 'Unknown') {
      return null;
    }

    const published = inputs.models.filter((model) =>
      PUBLISHED_MODEL.test(model),
    );
    const modelSuffix = published.length > 0 ? ` (${published.join(', ')})` : '';
    return {
      tier: 'synthesized',
      text: `${inputs.label} - ${inputs.category}${modelSuffix}`,
      curated: false,
    };
  }
}
