export interface AdvisorConfig {
  readonly precision: {
    /**
     * Decimal places kept on stored scores and used by the ranking sort key,
     * so that floating-point noise never decides an order.
     *
     * @defaultValue `12`
     */
    readonly scoreDecimals: number;
    /**
     * Decimal places shown for scores in explanations.
     *
     * @defaultValue `6`
     */
    readonly displayDecimals: number;
    /**
     * Allowed absolute difference between a declared `effectDelta` and the
     * actual step of the cumulative effect before the validator warns.
     *
     * @defaultValue `1e-6`
     */
    readonly effectDeltaTolerance: number;
  };
  readonly weights: {
    /** @defaultValue `0` */
    readonly min: number;
    /** @defaultValue `2` */
    readonly max: number;
    /**
     * Weight used for categories without an explicit entry.
     *
     * @defaultValue `1`
     */
    readonly neutral: number;
  };
  readonly catalog: {
    /**
     * Categories a complete catalog is expected to cover.
     *
     * @defaultValue `['attack', 'defense', 'utility']`
     */
    readonly expectedCategories: readonly string[];
    /**
     * Catalogs with fewer upgrades produce a validation warning.
     *
     * @defaultValue `10`
     */
    readonly minimumUpgradeCount: number;
  };
  readonly display: {
    /** @defaultValue `'coins'` */
    readonly currencyLabel: string;
  };
}

export type AdvisorConfigOverrides = Readonly<{
  readonly precision?: Partial<AdvisorConfig['precision']>;
  readonly weights?: Partial<AdvisorConfig['weights']>;
  readonly catalog?: Partial<AdvisorConfig['catalog']>;
  readonly display?: Partial<AdvisorConfig['display']>;
}>;

export const DEFAULT_ADVISOR_CONFIG: AdvisorConfig = Object.freeze({
  precision: Object.freeze({
    scoreDecimals: 12,
    displayDecimals: 6,
    effectDeltaTolerance: 1e-6,
  }),
  weights: Object.freeze({
    min: 0,
    max: 2,
    neutral: 1,
  }),
  catalog: Object.freeze({
    expectedCategories: Object.freeze(['attack', 'defense', 'utility']),
    minimumUpgradeCount: 10,
  }),
  display: Object.freeze({
    currencyLabel: 'coins',
  }),
});

// Number.prototype.toFixed accepts 0..100 digits.
const MAX_DECIMALS = 100;

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toNonNegativeNumber(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric === undefined || numeric < 0 ? undefined : numeric;
}

function toDecimals(value: unknown): number | undefined {
  const numeric = toNonNegativeNumber(value);
  if (numeric === undefined) {
    return undefined;
  }
  return Math.min(Math.floor(numeric), MAX_DECIMALS);
}

function toNonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function resolvePrecisionConfig(
  overrides: AdvisorConfigOverrides['precision'] | undefined,
): AdvisorConfig['precision'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ADVISOR_CONFIG.precision;

  return {
    scoreDecimals: toDecimals(source.scoreDecimals) ?? defaults.scoreDecimals,
    displayDecimals: toDecimals(source.displayDecimals) ?? defaults.displayDecimals,
    effectDeltaTolerance:
      toNonNegativeNumber(source.effectDeltaTolerance) ?? defaults.effectDeltaTolerance,
  };
}

function resolveWeightsConfig(
  overrides: AdvisorConfigOverrides['weights'] | undefined,
): AdvisorConfig['weights'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ADVISOR_CONFIG.weights;

  const min = toNonNegativeNumber(source.min) ?? defaults.min;
  const max = Math.max(min, toNonNegativeNumber(source.max) ?? defaults.max);
  const neutral = toFiniteNumber(source.neutral) ?? defaults.neutral;

  return {
    min,
    max,
    neutral: Math.min(Math.max(neutral, min), max),
  };
}

function resolveCatalogConfig(
  overrides: AdvisorConfigOverrides['catalog'] | undefined,
): AdvisorConfig['catalog'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ADVISOR_CONFIG.catalog;

  const categories = source.expectedCategories?.filter(
    (category) => toNonEmptyString(category) !== undefined,
  );
  const minimumUpgradeCount = toNonNegativeNumber(source.minimumUpgradeCount);

  return {
    expectedCategories: Object.freeze(categories ?? [...defaults.expectedCategories]),
    minimumUpgradeCount:
      minimumUpgradeCount === undefined
        ? defaults.minimumUpgradeCount
        : Math.floor(minimumUpgradeCount),
  };
}

function resolveDisplayConfig(
  overrides: AdvisorConfigOverrides['display'] | undefined,
): AdvisorConfig['display'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ADVISOR_CONFIG.display;

  return {
    currencyLabel: toNonEmptyString(source.currencyLabel) ?? defaults.currencyLabel,
  };
}

export function resolveAdvisorConfig(
  overrides?: AdvisorConfigOverrides,
): AdvisorConfig {
  const config: AdvisorConfig = {
    precision: resolvePrecisionConfig(overrides?.precision),
    weights: resolveWeightsConfig(overrides?.weights),
    catalog: resolveCatalogConfig(overrides?.catalog),
    display: resolveDisplayConfig(overrides?.display),
  };
  return Object.freeze({
    precision: Object.freeze(config.precision),
    weights: Object.freeze(config.weights),
    catalog: Object.freeze(config.catalog),
    display: Object.freeze(config.display),
  });
}
