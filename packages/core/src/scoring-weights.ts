import { DEFAULT_ADVISOR_CONFIG, type AdvisorConfig } from './config.js';

/**
 * Per-category multipliers keyed by category name. Categories without an
 * entry score with the neutral weight.
 */
export type ScoringWeights = Readonly<Record<string, number>>;

export type WeightBounds = AdvisorConfig['weights'];

export const NEUTRAL_WEIGHTS: ScoringWeights = Object.freeze({});

export function clampWeight(
  value: unknown,
  bounds: WeightBounds = DEFAULT_ADVISOR_CONFIG.weights,
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return bounds.neutral;
  }
  return Math.min(Math.max(value, bounds.min), bounds.max);
}

/**
 * Clamps every entry into `bounds`. Non-numeric and non-finite entries become
 * the neutral weight; blank category names are dropped.
 */
export function normalizeScoringWeights(
  input: Readonly<Record<string, unknown>>,
  bounds: WeightBounds = DEFAULT_ADVISOR_CONFIG.weights,
): ScoringWeights {
  const weights: Record<string, number> = {};
  for (const [category, value] of Object.entries(input)) {
    const key = category.trim();
    if (key.length === 0) {
      continue;
    }
    weights[key] = clampWeight(value, bounds);
  }
  return Object.freeze(weights);
}

export function weightForCategory(
  weights: ScoringWeights,
  category: string,
  neutral: number = DEFAULT_ADVISOR_CONFIG.weights.neutral,
): number {
  if (!Object.hasOwn(weights, category)) {
    return neutral;
  }
  const weight = weights[category];
  return weight === undefined ? neutral : weight;
}

export function formatWeights(weights: ScoringWeights): string {
  const entries = Object.entries(weights).sort(([left], [right]) =>
    left < right ? -1 : left > right ? 1 : 0,
  );
  if (entries.length === 0) {
    return 'all neutral';
  }
  return entries.map(([category, weight]) => `${category}=${weight}`).join(', ');
}
