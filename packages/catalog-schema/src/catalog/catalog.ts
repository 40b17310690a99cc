import { freezeUpgrade, type UpgradeDefinition } from '../modules/upgrades.js';

export interface CatalogProvenance {
  readonly version: string;
  readonly dataVersion: string;
  readonly source: string;
}

export interface UpgradeCatalog extends CatalogProvenance {
  readonly upgrades: readonly UpgradeDefinition[];
  getUpgrade(upgradeId: string): UpgradeDefinition | undefined;
  getByCategory(category: string): readonly UpgradeDefinition[];
  upgradeIds(): readonly string[];
  /**
   * Categories present in the data, in order of first appearance.
   */
  categories(): readonly string[];
}

export interface UpgradeCatalogSource extends CatalogProvenance {
  readonly upgrades: readonly UpgradeDefinition[];
}

/**
 * Builds the read-only catalog handed to scoring. Callers are expected to
 * have validated the source first; see `loadCatalog`.
 */
export const createUpgradeCatalog = (source: UpgradeCatalogSource): UpgradeCatalog => {
  const upgrades = Object.freeze(source.upgrades.map(freezeUpgrade));
  const byId = new Map<string, UpgradeDefinition>();
  const byCategory = new Map<string, UpgradeDefinition[]>();

  for (const upgrade of upgrades) {
    if (!byId.has(upgrade.id)) {
      byId.set(upgrade.id, upgrade);
    }
    const bucket = byCategory.get(upgrade.category);
    if (bucket) {
      bucket.push(upgrade);
    } else {
      byCategory.set(upgrade.category, [upgrade]);
    }
  }

  const frozenCategories = new Map<string, readonly UpgradeDefinition[]>();
  byCategory.forEach((bucket, category) => {
    frozenCategories.set(category, Object.freeze(bucket));
  });
  const ids = Object.freeze(upgrades.map((upgrade) => upgrade.id));
  const categories = Object.freeze([...frozenCategories.keys()]);
  const empty: readonly UpgradeDefinition[] = Object.freeze([]);

  return Object.freeze({
    version: source.version,
    dataVersion: source.dataVersion,
    source: source.source,
    upgrades,
    getUpgrade: (upgradeId: string) => byId.get(upgradeId),
    getByCategory: (category: string) => frozenCategories.get(category) ?? empty,
    upgradeIds: () => ids,
    categories: () => categories,
  });
};
