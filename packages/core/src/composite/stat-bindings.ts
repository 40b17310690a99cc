import type {
  ResearchDataset,
  UpgradeCatalog,
} from '@upgrade-advisor/catalog-schema';
import type { Decimal } from 'decimal.js';

import { computeMarginalScore } from '../marginal-score.js';
import { getLevel, getResearchLevel, type Profile } from '../profiles/profile.js';
import {
  CompositeDecimal,
  NEUTRAL_DAMAGE_STATS,
  type DamageStat,
  type DamageStats,
} from './damage-metric.js';

/**
 * Ties one composite stat to the upgrade providing it and, optionally, to
 * the research that boosts it.
 */
export interface StatBinding {
  readonly stat: DamageStat;
  readonly upgradeId: string;
  readonly researchId?: string;
}

export const DEFAULT_STAT_BINDINGS: readonly StatBinding[] = Object.freeze([
  { stat: 'baseDamage', upgradeId: 'damage', researchId: 'lab_damage' },
  { stat: 'attackSpeed', upgradeId: 'attack_speed', researchId: 'lab_attack_speed' },
  { stat: 'critChance', upgradeId: 'crit_chance' },
  { stat: 'critFactor', upgradeId: 'crit_factor', researchId: 'lab_crit_factor' },
  { stat: 'multishotChance', upgradeId: 'multishot_chance' },
  { stat: 'multishotTargets', upgradeId: 'multishot_targets' },
  { stat: 'rapidFireChance', upgradeId: 'rapid_fire_chance' },
  { stat: 'bounceChance', upgradeId: 'bounce_chance' },
  { stat: 'bounceTargets', upgradeId: 'bounce_targets' },
]);

export interface StatContext {
  readonly catalog: UpgradeCatalog;
  readonly profile: Profile;
  readonly research: ResearchDataset;
}

/**
 * Applies the research boost for `binding` to a raw effect value. Unknown
 * research multiplies by the neutral 1.0 returned by the dataset.
 */
export function applyResearchBoost(
  value: Decimal.Value,
  binding: StatBinding,
  context: StatContext,
): Decimal {
  const raw = new CompositeDecimal(value);
  if (binding.researchId === undefined) {
    return raw;
  }
  const boost = context.research.getValue(
    binding.researchId,
    getResearchLevel(context.profile, binding.researchId),
  );
  const research = context.research.getResearch(binding.researchId);
  return research?.boostType === 'additive' ? raw.plus(boost) : raw.times(boost);
}

/**
 * Current composite stats for a profile. Stats whose upgrade is missing from
 * the catalog keep their neutral value.
 */
export function resolveDamageStats(
  bindings: readonly StatBinding[],
  context: StatContext,
): DamageStats {
  const stats: Record<DamageStat, Decimal.Value> = { ...NEUTRAL_DAMAGE_STATS };
  for (const binding of bindings) {
    const upgrade = context.catalog.getUpgrade(binding.upgradeId);
    if (upgrade === undefined) {
      continue;
    }
    const { currentEffect } = computeMarginalScore(
      upgrade,
      getLevel(context.profile, binding.upgradeId),
    );
    stats[binding.stat] = applyResearchBoost(currentEffect, binding, context);
  }
  return stats;
}

export function findBinding(
  bindings: readonly StatBinding[],
  upgradeId: string,
): StatBinding | undefined {
  return bindings.find((binding) => binding.upgradeId === upgradeId);
}
