import type { UpgradeCatalog } from '@upgrade-advisor/catalog-schema';

import { computeMarginalScore } from '../marginal-score.js';
import { getLevel, type Profile } from '../profiles/profile.js';
import {
  normalizeScoringWeights,
  weightForCategory,
  type ScoringWeights,
} from '../scoring-weights.js';
import { BaseRankingStrategy, type RankingStrategyOptions } from './ranked-upgrade.js';
import type { RankedUpgrade } from './types.js';

export interface BalancedStrategyOptions extends RankingStrategyOptions {
  /**
   * Weights to use instead of the profile's own. Entries are clamped to the
   * configured bounds.
   */
  readonly weights?: Readonly<Record<string, unknown>>;
}

/**
 * Every eligible upgrade across all categories, scored as raw marginal
 * score times the category weight.
 */
export class BalancedStrategy extends BaseRankingStrategy {
  readonly name = 'balanced';

  readonly version = '1.0';

  private readonly weightOverride: ScoringWeights | undefined;

  constructor(options: BalancedStrategyOptions = {}) {
    super(options);
    this.weightOverride =
      options.weights === undefined
        ? undefined
        : normalizeScoringWeights(options.weights, this.config.weights);
  }

  rank(catalog: UpgradeCatalog, profile: Profile): readonly RankedUpgrade[] {
    const weights = this.weightOverride ?? profile.weights;
    const results: RankedUpgrade[] = [];

    for (const upgrade of catalog.upgrades) {
      const level = getLevel(profile, upgrade.id);
      if (level >= upgrade.maxLevel) {
        continue;
      }
      const marginal = computeMarginalScore(upgrade, level);
      // Dropped before weighting so no weight can lift a non-positive score.
      if (marginal.score <= 0) {
        continue;
      }
      const weight = weightForCategory(weights, upgrade.category, this.config.weights.neutral);
      results.push(this.build(upgrade, profile, marginal, marginal.score * weight, { weight }));
    }

    return this.sort(results);
  }

  protected override describeScore(ranked: RankedUpgrade): string {
    return (
      `  Score: ${ranked.marginalBenefit} / ${ranked.cost} * ${this.weightOf(ranked)}` +
      ` = ${this.formatScore(ranked.score)}`
    );
  }

  protected override describeMode(ranked: RankedUpgrade): string {
    return `${this.scoringMethod} (weight ${ranked.category}=${this.weightOf(ranked)})`;
  }

  private weightOf(ranked: RankedUpgrade): number {
    return ranked.weight ?? this.config.weights.neutral;
  }
}
