import { writeFileAtomic } from '../fs/atomic-write.js';
import type { UpgradeDefinition } from '../modules/upgrades.js';
import type { UpgradeCatalogSource } from './catalog.js';
import type { CatalogShape } from './schema.js';

const serializeUpgrade = (upgrade: UpgradeDefinition): CatalogShape['upgrades'][number] => ({
  id: upgrade.id,
  name: upgrade.name,
  category: upgrade.category,
  ...(upgrade.effectUnit === undefined ? {} : { effectUnit: upgrade.effectUnit }),
  effectType: upgrade.effectType,
  baseValue: upgrade.baseValue,
  maxLevel: upgrade.maxLevel,
  displayOrder: upgrade.displayOrder,
  levels: upgrade.levels.map((level) => ({
    level: level.level,
    cost: level.cost,
    cumulativeEffect: level.cumulativeEffect,
    effectDelta: level.effectDelta,
  })),
});

/**
 * Produces the plain persisted document for a catalog, with keys in the
 * on-disk order.
 */
export const serializeCatalog = (catalog: UpgradeCatalogSource): CatalogShape => ({
  version: catalog.version,
  dataVersion: catalog.dataVersion,
  source: catalog.source,
  upgrades: catalog.upgrades.map(serializeUpgrade),
});

export const stringifyCatalog = (catalog: UpgradeCatalogSource): string =>
  `${JSON.stringify(serializeCatalog(catalog), undefined, 2)}\n`;

export async function saveCatalog(
  catalog: UpgradeCatalogSource,
  filePath: string,
): Promise<void> {
  await writeFileAtomic(filePath, stringifyCatalog(catalog));
}
