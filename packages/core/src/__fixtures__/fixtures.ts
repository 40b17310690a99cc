import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import {
  loadCatalog,
  loadResearch,
  type ResearchDataset,
  type UpgradeCatalog,
} from '@upgrade-advisor/catalog-schema';

import {
  createProfile,
  freezeProfile,
  type LevelMap,
  type Profile,
} from '../profiles/profile.js';

export const TEST_CATALOG_PATH = fileURLToPath(new URL('./test-catalog.json', import.meta.url));
export const TEST_RESEARCH_PATH = fileURLToPath(new URL('./test-research.json', import.meta.url));

export const FIXED_NOW = new Date('2024-06-01T12:00:00.000Z');
export const fixedClock = (): Date => FIXED_NOW;

const readJson = (filePath: string): unknown => {
  const document: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return document;
};

/** Eight upgrades over attack, defense and utility, five levels each. */
export const loadTestCatalog = (): UpgradeCatalog =>
  loadCatalog(readJson(TEST_CATALOG_PATH), { minimumUpgradeCount: 1 });

export const loadTestResearch = (): ResearchDataset => loadResearch(readJson(TEST_RESEARCH_PATH));

export interface ProfileFixture {
  readonly levels?: LevelMap;
  readonly researchLevels?: LevelMap;
  readonly availableCurrency?: number;
  readonly weights?: Readonly<Record<string, number>>;
}

export const buildProfile = (fixture: ProfileFixture = {}): Profile => {
  const profile = createProfile('Test Build', { id: 'profile-1', now: fixedClock });
  return freezeProfile({
    ...profile,
    levels: fixture.levels ?? {},
    researchLevels: fixture.researchLevels ?? {},
    availableCurrency: fixture.availableCurrency ?? 0,
    weights: fixture.weights ?? {},
  });
};

export const MID_LEVELS: LevelMap = Object.freeze({
  attack_speed: 2,
  damage: 3,
  health: 1,
  coins_per_kill: 2,
});

export const maxedLevels = (catalog: UpgradeCatalog): LevelMap =>
  Object.fromEntries(catalog.upgrades.map((upgrade) => [upgrade.id, upgrade.maxLevel]));
