import type { RankedUpgrade } from './types.js';

export const DEFAULT_SCORE_DECIMALS = 12;

/**
 * Rounds a score to a fixed number of decimals so representation noise such
 * as `0.0010000000000000009` compares equal to `0.001`.
 */
export function roundScore(value: number, decimals = DEFAULT_SCORE_DECIMALS): number {
  const rounded = Number(value.toFixed(decimals));
  return Object.is(rounded, -0) ? 0 : rounded;
}

const compareText = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

/**
 * Score descending, then cost ascending, then name ascending by code unit.
 */
export function compareRankedUpgrades(
  left: RankedUpgrade,
  right: RankedUpgrade,
  decimals = DEFAULT_SCORE_DECIMALS,
): number {
  const leftScore = roundScore(left.score, decimals);
  const rightScore = roundScore(right.score, decimals);
  if (leftScore !== rightScore) {
    return leftScore > rightScore ? -1 : 1;
  }
  if (left.cost !== right.cost) {
    return left.cost < right.cost ? -1 : 1;
  }
  return compareText(left.upgradeName, right.upgradeName);
}

export function sortRankedUpgrades(
  entries: readonly RankedUpgrade[],
  decimals = DEFAULT_SCORE_DECIMALS,
): RankedUpgrade[] {
  return [...entries].sort((left, right) => compareRankedUpgrades(left, right, decimals));
}
