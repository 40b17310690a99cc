import type { UpgradeDefinition } from '@upgrade-advisor/catalog-schema';

export interface MarginalScore {
  readonly score: number;
  readonly cost: number;
  readonly currentEffect: number;
  readonly nextEffect: number;
  readonly marginalBenefit: number;
}

/**
 * Effect per unit of currency for buying the level after `currentLevel`.
 *
 * A maxed upgrade (including levels past `maxLevel` recorded by a stale
 * profile) scores 0 at cost 0 with both effects at the final cumulative
 * effect. A non-positive cost scores 0 but still reports the effects.
 */
export function computeMarginalScore(
  upgrade: UpgradeDefinition,
  currentLevel: number,
): MarginalScore {
  const lastLevel = upgrade.levels[upgrade.levels.length - 1];

  if (currentLevel >= upgrade.maxLevel) {
    const effect = lastLevel === undefined ? upgrade.baseValue : lastLevel.cumulativeEffect;
    return { score: 0, cost: 0, currentEffect: effect, nextEffect: effect, marginalBenefit: 0 };
  }

  const level = Math.max(0, Math.floor(currentLevel));
  // levels[i] holds the data for level i + 1.
  const current = level > 0 ? upgrade.levels[level - 1] : undefined;
  const currentEffect = current === undefined ? upgrade.baseValue : current.cumulativeEffect;
  const next = upgrade.levels[level];

  if (next === undefined) {
    return {
      score: 0,
      cost: 0,
      currentEffect,
      nextEffect: currentEffect,
      marginalBenefit: 0,
    };
  }

  const marginalBenefit = next.cumulativeEffect - currentEffect;
  const score = next.cost > 0 ? marginalBenefit / next.cost : 0;

  return {
    score,
    cost: next.cost,
    currentEffect,
    nextEffect: next.cumulativeEffect,
    marginalBenefit,
  };
}
