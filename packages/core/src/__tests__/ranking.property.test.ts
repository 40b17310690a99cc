import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { buildProfile, loadTestCatalog } from '../__fixtures__/fixtures.js';
import { BalancedStrategy } from '../ranking/balanced-strategy.js';
import { compareRankedUpgrades } from '../ranking/ordering.js';
import { PerCategoryBestStrategy } from '../ranking/per-category-strategy.js';

const propertyConfig = (offset: number): fc.Parameters<unknown> => ({
  numRuns: 100,
  seed: 842000 + offset,
});

const catalog = loadTestCatalog();

const levelsArbitrary = fc.record(
  Object.fromEntries(
    catalog.upgrades.map((upgrade) => [upgrade.id, fc.integer({ min: 0, max: upgrade.maxLevel })]),
  ),
);

const weightsArbitrary = fc.record(
  Object.fromEntries(
    catalog.categories().map((category) => [category, fc.double({ min: 0, max: 2, noNaN: true })]),
  ),
);

describe('ranking properties', () => {
  it('orders balanced results strictly by the shared sort key', () => {
    fc.assert(
      fc.property(levelsArbitrary, weightsArbitrary, (levels, weights) => {
        const ranked = new BalancedStrategy().rank(catalog, buildProfile({ levels, weights }));

        for (let index = 1; index < ranked.length; index += 1) {
          const previous = ranked[index - 1];
          const current = ranked[index];
          if (previous && current) {
            expect(compareRankedUpgrades(previous, current)).toBeLessThan(0);
          }
        }
      }),
      propertyConfig(0),
    );
  });

  it('never recommends maxed upgrades', () => {
    fc.assert(
      fc.property(levelsArbitrary, (levels) => {
        const ranked = new BalancedStrategy().rank(catalog, buildProfile({ levels }));

        ranked.forEach((entry) => {
          expect(entry.currentLevel).toBeLessThan(catalog.getUpgrade(entry.upgradeId)?.maxLevel ?? 0);
          expect(entry.nextLevel).toBe(entry.currentLevel + 1);
        });
      }),
      propertyConfig(1),
    );
  });

  it('picks each category winner from the top of the neutral balanced ranking', () => {
    fc.assert(
      fc.property(levelsArbitrary, (levels) => {
        const profile = buildProfile({ levels });
        const winners = new PerCategoryBestStrategy().rank(catalog, profile);
        const balanced = new BalancedStrategy().rank(catalog, profile);

        const categories = winners.map((entry) => entry.category);
        expect(new Set(categories).size).toBe(categories.length);
        winners.forEach((winner) => {
          expect(winner.score).toBeGreaterThan(0);
          const best = balanced.find((entry) => entry.category === winner.category);
          expect(best?.upgradeId).toBe(winner.upgradeId);
        });
      }),
      propertyConfig(2),
    );
  });

  it('returns the same ranking for repeated calls', () => {
    fc.assert(
      fc.property(levelsArbitrary, weightsArbitrary, (levels, weights) => {
        const profile = buildProfile({ levels, weights });
        const strategy = new BalancedStrategy();

        expect(strategy.rank(catalog, profile)).toEqual(strategy.rank(catalog, profile));
      }),
      propertyConfig(3),
    );
  });
});
