export {
  DEFAULT_ADVISOR_CONFIG,
  resolveAdvisorConfig,
  type AdvisorConfig,
  type AdvisorConfigOverrides,
} from './config.js';

export {
  createConsoleTelemetry,
  createContextualTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';

export {
  catalogLoadOptions,
  loadAdvisorCatalog,
  loadAdvisorCatalogFile,
  type AdvisorCatalogOptions,
} from './catalog-loader.js';

export {
  clampWeight,
  formatWeights,
  NEUTRAL_WEIGHTS,
  normalizeScoringWeights,
  weightForCategory,
  type ScoringWeights,
  type WeightBounds,
} from './scoring-weights.js';

export { computeMarginalScore, type MarginalScore } from './marginal-score.js';

export {
  createProfile,
  duplicateProfile,
  freezeProfile,
  getLevel,
  getResearchLevel,
  parseProfile,
  ProfileMutationError,
  profileSchema,
  safeParseProfile,
  serializeProfile,
  setCurrency,
  setLevel,
  setResearchLevel,
  setTags,
  setWeights,
  type Clock,
  type LevelMap,
  type NewProfileOptions,
  type Profile,
  type ProfileInput,
  type ProfileMutationContext,
} from './profiles/profile.js';
export {
  BaseProfileStore,
  createInMemoryProfileStore,
  formatBackupStamp,
  InMemoryProfileStore,
  sortProfilesByName,
  type ProfileStore,
  type ProfileStoreOptions,
} from './profiles/profile-store.js';
export {
  createFileProfileStore,
  FileProfileStore,
  type FileProfileStoreOptions,
} from './profiles/file-profile-store.js';

export {
  CompositeDecimal,
  computeDamageOutput,
  computeEffectiveAttackSpeed,
  DAMAGE_OUTPUT_METRIC,
  NEUTRAL_DAMAGE_STATS,
  type DamageStat,
  type DamageStats,
} from './composite/damage-metric.js';
export {
  applyResearchBoost,
  DEFAULT_STAT_BINDINGS,
  findBinding,
  resolveDamageStats,
  type StatBinding,
  type StatContext,
} from './composite/stat-bindings.js';

export * from './ranking/index.js';
