import {
  EMPTY_RESEARCH_DATASET,
  type ResearchDataset,
  type UpgradeCatalog,
} from '@upgrade-advisor/catalog-schema';
import type { Decimal } from 'decimal.js';

import {
  computeDamageOutput,
  DAMAGE_OUTPUT_METRIC,
  type DamageStat,
} from '../composite/damage-metric.js';
import {
  applyResearchBoost,
  DEFAULT_STAT_BINDINGS,
  findBinding,
  resolveDamageStats,
  type StatBinding,
  type StatContext,
} from '../composite/stat-bindings.js';
import { computeMarginalScore } from '../marginal-score.js';
import { getLevel, type Profile } from '../profiles/profile.js';
import { BaseRankingStrategy, type RankingStrategyOptions } from './ranked-upgrade.js';
import type { RankedUpgrade } from './types.js';

export interface ReferenceStrategyOptions extends RankingStrategyOptions {
  readonly research?: ResearchDataset;
  readonly bindings?: readonly StatBinding[];
}

/**
 * Scores upgrades that feed the composite damage metric by how much one
 * more level raises that metric per unit of currency. Every other upgrade
 * falls back to its raw marginal score. Non-positive scores are dropped.
 */
export class ReferenceStrategy extends BaseRankingStrategy {
  readonly name = 'reference';

  readonly version = '1.0';

  private readonly research: ResearchDataset;

  private readonly bindings: readonly StatBinding[];

  constructor(options: ReferenceStrategyOptions = {}) {
    super(options);
    this.research = options.research ?? EMPTY_RESEARCH_DATASET;
    this.bindings = options.bindings ?? DEFAULT_STAT_BINDINGS;
  }

  rank(catalog: UpgradeCatalog, profile: Profile): readonly RankedUpgrade[] {
    const context: StatContext = { catalog, profile, research: this.research };
    const baselineStats = resolveDamageStats(this.bindings, context);
    const baseline = computeDamageOutput(baselineStats);
    const results: RankedUpgrade[] = [];

    for (const upgrade of catalog.upgrades) {
      const level = getLevel(profile, upgrade.id);
      if (level >= upgrade.maxLevel) {
        continue;
      }
      const marginal = computeMarginalScore(upgrade, level);
      const binding = findBinding(this.bindings, upgrade.id);

      if (binding === undefined) {
        if (marginal.score > 0) {
          results.push(this.build(upgrade, profile, marginal, marginal.score));
        }
        continue;
      }

      if (marginal.cost <= 0) {
        continue;
      }
      const advanced: Record<DamageStat, Decimal.Value> = { ...baselineStats };
      advanced[binding.stat] = applyResearchBoost(marginal.nextEffect, binding, context);
      const next = computeDamageOutput(advanced);
      const score = next.minus(baseline).div(marginal.cost).toNumber();
      if (score <= 0) {
        continue;
      }
      results.push(
        this.build(upgrade, profile, marginal, score, {
          metric: {
            name: DAMAGE_OUTPUT_METRIC,
            baseline: baseline.toNumber(),
            next: next.toNumber(),
          },
        }),
      );
    }

    return this.sort(results);
  }

  protected override describeScore(ranked: RankedUpgrade): string {
    if (ranked.metric === undefined) {
      return super.describeScore(ranked);
    }
    return (
      `  Score: (${ranked.metric.next} - ${ranked.metric.baseline}) / ${ranked.cost}` +
      ` = ${this.formatScore(ranked.score)}`
    );
  }

  protected override describeExtras(ranked: RankedUpgrade): string[] {
    if (ranked.metric === undefined) {
      return [];
    }
    return [`  Composite ${ranked.metric.name}: ${ranked.metric.baseline} → ${ranked.metric.next}`];
  }

  protected override describeMode(ranked: RankedUpgrade): string {
    const basis =
      ranked.metric === undefined ? 'raw marginal' : `composite=${ranked.metric.name}`;
    return `${this.scoringMethod} (${basis})`;
  }
}
