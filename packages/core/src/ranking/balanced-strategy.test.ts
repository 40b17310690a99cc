import { loadCatalog, serializeCatalog } from '@upgrade-advisor/catalog-schema';
import { describe, expect, it } from 'vitest';

import {
  buildProfile,
  loadTestCatalog,
  maxedLevels,
  MID_LEVELS,
} from '../__fixtures__/fixtures.js';
import { computeMarginalScore } from '../marginal-score.js';
import { BalancedStrategy } from './balanced-strategy.js';
import { roundScore } from './ordering.js';

const catalog = loadTestCatalog();

describe('BalancedStrategy', () => {
  it('ranks every eligible upgrade with neutral weights', () => {
    const ranked = new BalancedStrategy().rank(catalog, buildProfile());

    expect(ranked.map((entry) => entry.upgradeId)).toEqual([
      'health',
      'damage',
      'crit_chance',
      'health_regen',
      'interest',
      'attack_speed',
      'crit_factor',
      'coins_per_kill',
    ]);
    expect(ranked.every((entry) => entry.weight === 1)).toBe(true);
    expect(ranked[0]?.scoringMethod).toBe('balanced v1.0');
  });

  it('matches the raw marginal score when every weight is 1', () => {
    const profile = buildProfile({
      levels: MID_LEVELS,
      weights: { attack: 1, defense: 1, utility: 1 },
    });

    const ranked = new BalancedStrategy().rank(catalog, profile);

    expect(ranked).toHaveLength(8);
    for (const entry of ranked) {
      const upgrade = catalog.getUpgrade(entry.upgradeId);
      expect(upgrade).toBeDefined();
      if (upgrade !== undefined) {
        const raw = computeMarginalScore(upgrade, entry.currentLevel);
        expect(entry.score).toBe(roundScore(raw.score));
      }
    }
  });

  it('applies category weights from the profile', () => {
    const profile = buildProfile({ weights: { attack: 2, defense: 0 } });

    const ranked = new BalancedStrategy().rank(catalog, profile);

    expect(ranked.map((entry) => entry.upgradeId)).toEqual([
      'damage',
      'crit_chance',
      'interest',
      'attack_speed',
      'crit_factor',
      'coins_per_kill',
      'health_regen',
      'health',
    ]);
    expect(ranked[0]?.score).toBe(0.2);
    expect(
      ranked.filter((entry) => entry.category === 'defense').map((entry) => entry.score),
    ).toEqual([0, 0]);
  });

  it('prefers constructor weights over the profile', () => {
    const profile = buildProfile({ weights: { utility: 0 } });

    const ranked = new BalancedStrategy({ weights: { utility: 2 } }).rank(catalog, profile);
    const interest = ranked.find((entry) => entry.upgradeId === 'interest');

    expect(interest?.weight).toBe(2);
    expect(interest?.score).toBe(0.016666666667);
  });

  it('clamps constructor weights into range', () => {
    const ranked = new BalancedStrategy({ weights: { attack: 10 } }).rank(
      catalog,
      buildProfile(),
    );

    expect(ranked.find((entry) => entry.upgradeId === 'damage')?.weight).toBe(2);
  });

  it('uses the neutral weight for unknown categories', () => {
    const document = serializeCatalog(catalog);
    const extended = loadCatalog(
      {
        ...document,
        upgrades: [
          ...document.upgrades,
          {
            id: 'gem_finder',
            name: 'Gem Finder',
            category: 'economy',
            effectType: 'additive',
            baseValue: 0,
            maxLevel: 1,
            displayOrder: 1,
            levels: [{ level: 1, cost: 100, cumulativeEffect: 2, effectDelta: 2 }],
          },
        ],
      },
      { minimumUpgradeCount: 1 },
    );

    const ranked = new BalancedStrategy().rank(
      extended,
      buildProfile({ weights: { attack: 0.5 } }),
    );
    const gemFinder = ranked.find((entry) => entry.upgradeId === 'gem_finder');

    expect(gemFinder?.weight).toBe(1);
    expect(gemFinder?.score).toBe(0.02);
  });

  it('is deterministic across calls', () => {
    const strategy = new BalancedStrategy();
    const profile = buildProfile({ levels: MID_LEVELS, weights: { attack: 1.3 } });

    expect(strategy.rank(catalog, profile)).toEqual(strategy.rank(catalog, profile));
  });

  it('returns nothing for a maxed profile', () => {
    expect(
      new BalancedStrategy().rank(catalog, buildProfile({ levels: maxedLevels(catalog) })),
    ).toEqual([]);
  });

  it('explains the weight it applied', () => {
    const strategy = new BalancedStrategy();
    const ranked = strategy.rank(catalog, buildProfile({ weights: { attack: 1.5 } }));
    const damage = ranked.find((entry) => entry.upgradeId === 'damage');
    if (damage === undefined) {
      throw new Error('expected a ranked damage upgrade');
    }

    expect(strategy.explain(damage)).toBe(
      [
        'Damage (level 0 → 1)',
        '  Cost: 50 coins',
        '  Effect: 0 → 5',
        '  Marginal Benefit: 5',
        '  Score: 5 / 50 * 1.5 = 0.150000',
        '  Mode: balanced v1.0 (weight attack=1.5)',
      ].join('\n'),
    );
  });
});
