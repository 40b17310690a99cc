import type { UpgradeCatalog } from './catalog/catalog.js';
import { loadCatalog, type CatalogLoadOptions } from './catalog/load.js';
import type { CatalogInput } from './catalog/schema.js';
import {
  researchDefinitionSchema,
  type ResearchDefinition,
  type ResearchInput,
} from './modules/research.js';
import {
  upgradeDefinitionSchema,
  type UpgradeDefinition,
  type UpgradeInput,
  type UpgradeLevel,
} from './modules/upgrades.js';

// Factories validate plain input and return frozen definitions. Invalid
// input throws, so they are meant for authored data and tests rather than
// for files read at run time (use `safeLoadCatalog` there).

/**
 * Creates a validated upgrade definition from plain input.
 *
 * @example
 * ```typescript
 * const damage = createUpgrade({
 *   id: 'damage',
 *   name: 'Damage',
 *   category: 'attack',
 *   effectType: 'additive',
 *   baseValue: 0,
 *   maxLevel: 2,
 *   displayOrder: 1,
 *   levels: createLevelLadder(0, [
 *     { cost: 50, effect: 5 },
 *     { cost: 120, effect: 10 },
 *   ]),
 * });
 * ```
 */
export function createUpgrade(input: UpgradeInput): UpgradeDefinition {
  return upgradeDefinitionSchema.parse(input);
}

/**
 * Creates a research definition from plain input.
 */
export function createResearch(input: ResearchInput): ResearchDefinition {
  return researchDefinitionSchema.parse(input);
}

/**
 * Creates a catalog from plain input, running the same checks as
 * {@link loadCatalog}. Throws `CatalogValidationError` on blocking issues.
 */
export function createCatalog(
  input: CatalogInput,
  options: CatalogLoadOptions = {},
): UpgradeCatalog {
  return loadCatalog(input, options);
}

export interface LevelStep {
  readonly cost: number;
  readonly effect: number;
}

/**
 * Expands `(cost, cumulative effect)` pairs into numbered levels whose
 * `effectDelta` is the difference to the previous step (or to `baseValue`
 * for the first).
 */
export function createLevelLadder(
  baseValue: number,
  steps: readonly LevelStep[],
): UpgradeLevel[] {
  let previous = baseValue;
  return steps.map((step, index) => {
    const entry: UpgradeLevel = {
      level: index + 1,
      cost: step.cost,
      cumulativeEffect: step.effect,
      effectDelta: step.effect - previous,
    };
    previous = step.effect;
    return entry;
  });
}
