import type { CatalogInput } from '../catalog/schema.js';
import { createLevelLadder } from '../factories.js';
import type { UpgradeInput } from '../modules/upgrades.js';

export const buildUpgradeInput = (
  overrides: Partial<UpgradeInput> = {},
): UpgradeInput => ({
  id: 'damage',
  name: 'Damage',
  category: 'attack',
  effectUnit: 'pts',
  effectType: 'additive',
  baseValue: 0,
  maxLevel: 3,
  displayOrder: 1,
  levels: createLevelLadder(0, [
    { cost: 50, effect: 5 },
    { cost: 120, effect: 10 },
    { cost: 250, effect: 16 },
  ]),
  ...overrides,
});

/**
 * Three upgrades, one per default category. Small enough to trigger the
 * upgrade-count warning under default options.
 */
export const buildCatalogInput = (
  upgrades: readonly UpgradeInput[] = [
    buildUpgradeInput(),
    buildUpgradeInput({
      id: 'health',
      name: 'Health',
      category: 'defense',
      effectUnit: 'HP',
      levels: createLevelLadder(0, [
        { cost: 75, effect: 10 },
        { cost: 150, effect: 20 },
        { cost: 300, effect: 30 },
      ]),
    }),
    buildUpgradeInput({
      id: 'coins_per_kill',
      name: 'Coins per Kill',
      category: 'utility',
      effectUnit: 'x',
      effectType: 'multiplicative',
      baseValue: 1,
      levels: createLevelLadder(1, [
        { cost: 90, effect: 1.5 },
        { cost: 200, effect: 2 },
        { cost: 450, effect: 2.5 },
      ]),
    }),
  ],
): CatalogInput => ({
  version: '1.0',
  dataVersion: '2024.06',
  source: 'test fixture',
  upgrades: [...upgrades],
});

// Options that silence the catalog-wide warnings for small fixtures.
export const quietOptions = {
  minimumUpgradeCount: 1,
  expectedCategories: [],
} as const;
