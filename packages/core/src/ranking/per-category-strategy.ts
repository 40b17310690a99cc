import type { UpgradeCatalog } from '@upgrade-advisor/catalog-schema';

import { computeMarginalScore } from '../marginal-score.js';
import { getLevel, type Profile } from '../profiles/profile.js';
import { compareRankedUpgrades } from './ordering.js';
import { BaseRankingStrategy, type RankingStrategyOptions } from './ranked-upgrade.js';
import type { RankedUpgrade } from './types.js';

/**
 * The single best next purchase in each category. Categories come from the
 * catalog data; a category with no positive-score candidate is left out.
 */
export class PerCategoryBestStrategy extends BaseRankingStrategy {
  readonly name = 'per_category_best';

  readonly version = '1.0';

  constructor(options: RankingStrategyOptions = {}) {
    super(options);
  }

  rank(catalog: UpgradeCatalog, profile: Profile): readonly RankedUpgrade[] {
    const decimals = this.config.precision.scoreDecimals;
    const best = new Map<string, RankedUpgrade>();

    for (const upgrade of catalog.upgrades) {
      const level = getLevel(profile, upgrade.id);
      if (level >= upgrade.maxLevel) {
        continue;
      }
      const marginal = computeMarginalScore(upgrade, level);
      if (marginal.score <= 0) {
        continue;
      }

      const candidate = this.build(upgrade, profile, marginal, marginal.score);
      const incumbent = best.get(upgrade.category);
      if (
        incumbent === undefined ||
        compareRankedUpgrades(candidate, incumbent, decimals) < 0
      ) {
        best.set(upgrade.category, candidate);
      }
    }

    return this.sort([...best.values()]);
  }
}
