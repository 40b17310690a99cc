import { Decimal } from 'decimal.js';

/**
 * Decimal constructor for all composite-metric arithmetic (40 significant
 * digits).
 */
export const CompositeDecimal = Decimal.clone({ precision: 40 });

export const DAMAGE_OUTPUT_METRIC = 'damage_output';

export interface DamageStats {
  readonly baseDamage: Decimal.Value;
  /** Attacks per time unit. */
  readonly attackSpeed: Decimal.Value;
  /** Percent, 0..100. */
  readonly critChance: Decimal.Value;
  readonly critFactor: Decimal.Value;
  /** Percent, 0..100. */
  readonly multishotChance: Decimal.Value;
  readonly multishotTargets: Decimal.Value;
  /** Percent, 0..100. */
  readonly rapidFireChance: Decimal.Value;
  /** Percent, 0..100. */
  readonly bounceChance: Decimal.Value;
  readonly bounceTargets: Decimal.Value;
}

export type DamageStat = keyof DamageStats;

/**
 * Values that make every branch of the formula collapse to 1.0, used for
 * stats the catalog does not provide.
 */
export const NEUTRAL_DAMAGE_STATS: DamageStats = Object.freeze({
  baseDamage: 0,
  attackSpeed: 1,
  critChance: 0,
  critFactor: 1,
  multishotChance: 0,
  multishotTargets: 1,
  rapidFireChance: 0,
  bounceChance: 0,
  bounceTargets: 1,
});

// A rapid-fire proc grants +400% attack speed for one time unit.
const RAPID_FIRE_BONUS_PERCENT = 4;
const RAPID_FIRE_DURATION = 1;

const ONE = new CompositeDecimal(1);
const HUNDRED = new CompositeDecimal(100);

const chanceMultiplier = (chance: Decimal.Value, magnitude: Decimal.Value): Decimal => {
  const probability = new CompositeDecimal(chance).div(HUNDRED);
  return ONE.minus(probability).plus(probability.times(magnitude));
};

export function computeEffectiveAttackSpeed(
  attackSpeed: Decimal.Value,
  rapidFireChance: Decimal.Value,
): Decimal {
  const speed = new CompositeDecimal(attackSpeed);
  const rate = new CompositeDecimal(rapidFireChance);
  if (!rate.gt(0) || !speed.gt(0)) {
    return speed;
  }
  const averageTimeBetweenProcs = ONE.div(speed).times(HUNDRED.div(rate));
  const averageIncreasePercent = new CompositeDecimal(
    RAPID_FIRE_BONUS_PERCENT * RAPID_FIRE_DURATION,
  ).div(ONE.plus(averageTimeBetweenProcs));
  return speed.times(ONE.plus(averageIncreasePercent.div(HUNDRED)));
}

/**
 * Damage per time unit from the combined attack stats.
 *
 * @example
 * computeDamageOutput({ ...NEUTRAL_DAMAGE_STATS, baseDamage: 10, critChance: 50, critFactor: 2 });
 * // => 15
 */
export function computeDamageOutput(stats: DamageStats): Decimal {
  return new CompositeDecimal(stats.baseDamage)
    .times(computeEffectiveAttackSpeed(stats.attackSpeed, stats.rapidFireChance))
    .times(chanceMultiplier(stats.critChance, stats.critFactor))
    .times(chanceMultiplier(stats.multishotChance, stats.multishotTargets))
    .times(chanceMultiplier(stats.bounceChance, stats.bounceTargets));
}
