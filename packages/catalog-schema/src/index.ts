export {
  CatalogSchemaError,
  CatalogValidationError,
  CatalogNotFoundError,
  fromZodIssues,
  type CatalogIssue,
  type CatalogIssueSeverity,
} from './errors.js';

export * from './base/ids.js';
export * from './base/numbers.js';

export * from './modules/upgrades.js';
export * from './modules/research.js';

export {
  collectUpgradeIssues,
  DEFAULT_EFFECT_DELTA_TOLERANCE,
} from './validation/upgrade-checks.js';
export {
  validateCatalog,
  isCatalogUsable,
  formatValidationSummary,
  DEFAULT_EXPECTED_CATEGORIES,
  DEFAULT_MINIMUM_UPGRADE_COUNT,
  type CatalogLike,
  type CatalogValidationOptions,
  type CatalogValidationReport,
} from './validation/validate-catalog.js';
export { validateRawCatalog } from './validation/validate-raw.js';

export {
  catalogShapeSchema,
  type CatalogShape,
  type CatalogInput,
} from './catalog/schema.js';
export {
  createUpgradeCatalog,
  type CatalogProvenance,
  type UpgradeCatalog,
  type UpgradeCatalogSource,
} from './catalog/catalog.js';
export {
  safeLoadCatalog,
  loadCatalog,
  parseCatalogText,
  readDataFile,
  loadCatalogFile,
  loadResearchFile,
  type CatalogLoadOptions,
  type CatalogLoadResult,
  type CatalogLoadSuccess,
  type CatalogLoadFailure,
} from './catalog/load.js';
export {
  serializeCatalog,
  stringifyCatalog,
  saveCatalog,
} from './catalog/serialize.js';

export { writeFileAtomic, removeIfPresent, isNodeError } from './fs/atomic-write.js';

export {
  createUpgrade,
  createResearch,
  createCatalog,
  createLevelLadder,
  type LevelStep,
} from './factories.js';
