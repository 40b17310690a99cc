import type { ResearchDataset } from '@upgrade-advisor/catalog-schema';

import type { StatBinding } from '../composite/stat-bindings.js';
import { BalancedStrategy } from './balanced-strategy.js';
import { PerCategoryBestStrategy } from './per-category-strategy.js';
import type { RankingStrategyOptions } from './ranked-upgrade.js';
import { ReferenceStrategy } from './reference-strategy.js';
import type { RankingStrategy, RankingStrategyKind } from './types.js';

export interface CreateRankingStrategyOptions extends RankingStrategyOptions {
  /** Balanced only: weights replacing the profile's own. */
  readonly weights?: Readonly<Record<string, unknown>>;
  /** Reference only. */
  readonly research?: ResearchDataset;
  /** Reference only. */
  readonly bindings?: readonly StatBinding[];
}

export function createRankingStrategy(
  kind: RankingStrategyKind,
  options: CreateRankingStrategyOptions = {},
): RankingStrategy {
  switch (kind) {
    case 'per-category':
      return new PerCategoryBestStrategy(options);
    case 'balanced':
      return new BalancedStrategy(options);
    case 'reference':
      return new ReferenceStrategy(options);
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unknown ranking strategy: ${String(exhaustive)}`);
    }
  }
}

export function isRankingStrategyKind(value: string): value is RankingStrategyKind {
  return value === 'per-category' || value === 'balanced' || value === 'reference';
}

export { BalancedStrategy, type BalancedStrategyOptions } from './balanced-strategy.js';
export { PerCategoryBestStrategy } from './per-category-strategy.js';
export { ReferenceStrategy, type ReferenceStrategyOptions } from './reference-strategy.js';
export {
  BaseRankingStrategy,
  formatCost,
  type RankedUpgradeExtras,
  type RankingStrategyOptions,
} from './ranked-upgrade.js';
export {
  compareRankedUpgrades,
  DEFAULT_SCORE_DECIMALS,
  roundScore,
  sortRankedUpgrades,
} from './ordering.js';
export {
  RANKING_STRATEGY_KINDS,
  type CompositeMetricSnapshot,
  type RankedUpgrade,
  type RankingStrategy,
  type RankingStrategyKind,
} from './types.js';
