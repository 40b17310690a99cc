import type { UpgradeCatalog } from '@upgrade-advisor/catalog-schema';

import type { Profile } from '../profiles/profile.js';

export interface CompositeMetricSnapshot {
  readonly name: string;
  readonly baseline: number;
  readonly next: number;
}

/**
 * One recommendation. Carries every input of its score so `explain` can
 * rebuild the arithmetic.
 */
export interface RankedUpgrade {
  readonly upgradeId: string;
  readonly upgradeName: string;
  readonly category: string;
  readonly currentLevel: number;
  readonly nextLevel: number;
  readonly cost: number;
  readonly currentEffect: number;
  readonly nextEffect: number;
  readonly marginalBenefit: number;
  readonly score: number;
  readonly affordable: boolean;
  /** `<name> v<version>` of the producing strategy. */
  readonly scoringMethod: string;
  /** Category weight applied by the balanced strategy. */
  readonly weight?: number;
  /** Composite values behind a composite-metric score. */
  readonly metric?: CompositeMetricSnapshot;
}

export interface RankingStrategy {
  readonly name: string;
  readonly version: string;
  rank(catalog: UpgradeCatalog, profile: Profile): readonly RankedUpgrade[];
  explain(ranked: RankedUpgrade): string;
}

export type RankingStrategyKind = 'per-category' | 'balanced' | 'reference';

export const RANKING_STRATEGY_KINDS: readonly RankingStrategyKind[] = Object.freeze([
  'per-category',
  'balanced',
  'reference',
]);
