import type { UpgradeCatalog, UpgradeDefinition } from '@upgrade-advisor/catalog-schema';

import { DEFAULT_ADVISOR_CONFIG, type AdvisorConfig } from '../config.js';
import type { MarginalScore } from '../marginal-score.js';
import { getLevel, type Profile } from '../profiles/profile.js';
import { roundScore, sortRankedUpgrades } from './ordering.js';
import type {
  CompositeMetricSnapshot,
  RankedUpgrade,
  RankingStrategy,
} from './types.js';

export interface RankingStrategyOptions {
  readonly config?: AdvisorConfig;
}

export interface RankedUpgradeExtras {
  readonly weight?: number;
  readonly metric?: CompositeMetricSnapshot;
}

export function formatCost(cost: number): string {
  return cost.toLocaleString('en-US');
}

/**
 * Shared plumbing for the ranking strategies: building frozen results,
 * sorting them and rendering the common part of an explanation.
 */
export abstract class BaseRankingStrategy implements RankingStrategy {
  abstract readonly name: string;

  abstract readonly version: string;

  protected readonly config: AdvisorConfig;

  protected constructor(options: RankingStrategyOptions = {}) {
    this.config = options.config ?? DEFAULT_ADVISOR_CONFIG;
  }

  get scoringMethod(): string {
    return `${this.name} v${this.version}`;
  }

  abstract rank(catalog: UpgradeCatalog, profile: Profile): readonly RankedUpgrade[];

  explain(ranked: RankedUpgrade): string {
    return [
      ...this.describeTransition(ranked),
      ...this.describeExtras(ranked),
      this.describeScore(ranked),
      `  Mode: ${this.describeMode(ranked)}`,
    ].join('\n');
  }

  protected describeScore(ranked: RankedUpgrade): string {
    return `  Score: ${ranked.marginalBenefit} / ${ranked.cost} = ${this.formatScore(ranked.score)}`;
  }

  protected describeExtras(_ranked: RankedUpgrade): string[] {
    return [];
  }

  protected describeMode(_ranked: RankedUpgrade): string {
    return this.scoringMethod;
  }

  protected formatScore(score: number): string {
    return score.toFixed(this.config.precision.displayDecimals);
  }

  protected build(
    upgrade: UpgradeDefinition,
    profile: Profile,
    marginal: MarginalScore,
    score: number,
    extras: RankedUpgradeExtras = {},
  ): RankedUpgrade {
    const currentLevel = getLevel(profile, upgrade.id);
    return Object.freeze({
      upgradeId: upgrade.id,
      upgradeName: upgrade.name,
      category: upgrade.category,
      currentLevel,
      nextLevel: currentLevel + 1,
      cost: marginal.cost,
      currentEffect: marginal.currentEffect,
      nextEffect: marginal.nextEffect,
      marginalBenefit: marginal.marginalBenefit,
      score: roundScore(score, this.config.precision.scoreDecimals),
      affordable: profile.availableCurrency >= marginal.cost,
      scoringMethod: this.scoringMethod,
      ...(extras.weight === undefined ? {} : { weight: extras.weight }),
      ...(extras.metric === undefined ? {} : { metric: Object.freeze({ ...extras.metric }) }),
    });
  }

  protected sort(entries: readonly RankedUpgrade[]): readonly RankedUpgrade[] {
    return Object.freeze(sortRankedUpgrades(entries, this.config.precision.scoreDecimals));
  }

  private describeTransition(ranked: RankedUpgrade): string[] {
    return [
      `${ranked.upgradeName} (level ${ranked.currentLevel} → ${ranked.nextLevel})`,
      `  Cost: ${formatCost(ranked.cost)} ${this.config.display.currencyLabel}`,
      `  Effect: ${ranked.currentEffect} → ${ranked.nextEffect}`,
      `  Marginal Benefit: ${ranked.marginalBenefit}`,
    ];
  }
}
