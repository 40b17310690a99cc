import {
  catalogShapeSchema,
  EMPTY_RESEARCH_DATASET,
  formatValidationSummary,
  fromZodIssues,
  loadResearchFile,
  readDataFile,
  validateCatalog,
  validateRawCatalog,
  type CatalogValidationReport,
  type ResearchDataset,
} from '@upgrade-advisor/catalog-schema';
import {
  createFileProfileStore,
  createRankingStrategy,
  DEFAULT_ADVISOR_CONFIG,
  formatCost,
  loadAdvisorCatalogFile,
  type AdvisorConfig,
  type ProfileStore,
  type RankedUpgrade,
  type RankingStrategyKind,
  type TelemetryFacade,
} from '@upgrade-advisor/core';

import type { Logger, OutputStream } from './logging.js';

export interface CommandContext {
  readonly logger: Logger;
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
  readonly config?: AdvisorConfig;
  readonly telemetry?: TelemetryFacade;
  readonly now?: () => number;
}

export interface ValidateCommandOptions {
  readonly catalogPath: string;
}

export interface RankCommandOptions {
  readonly catalogPath: string;
  readonly researchPath: string | undefined;
  readonly profilesDir: string;
  readonly profileId: string;
  readonly strategy: RankingStrategyKind;
  readonly explain: boolean;
  readonly limit: number | undefined;
  /** Overrides the file store rooted at `profilesDir`. */
  readonly store?: ProfileStore;
}

const TOP_ENTRIES_LOGGED = 3;

const writeLine = (stream: OutputStream, line: string): void => {
  stream.write(`${line}\n`);
};

/**
 * Runs every check against the raw document, the schema and the catalog
 * invariants, so the summary lists warnings even when errors are present.
 */
export function buildValidationReport(
  document: unknown,
  config: AdvisorConfig = DEFAULT_ADVISOR_CONFIG,
): CatalogValidationReport {
  const raw = validateRawCatalog(document);
  if (raw.errors.length > 0) {
    return raw;
  }
  const parsed = catalogShapeSchema.safeParse(document);
  if (!parsed.success) {
    return { errors: fromZodIssues(parsed.error.issues), warnings: [] };
  }
  return validateCatalog(parsed.data, {
    expectedCategories: config.catalog.expectedCategories,
    minimumUpgradeCount: config.catalog.minimumUpgradeCount,
    effectDeltaTolerance: config.precision.effectDeltaTolerance,
  });
}

const countUpgrades = (document: unknown): number => {
  const parsed = catalogShapeSchema.safeParse(document);
  return parsed.success ? parsed.data.upgrades.length : 0;
};

export async function runValidateCommand(
  options: ValidateCommandOptions,
  context: CommandContext,
): Promise<number> {
  const document = await readDataFile(options.catalogPath);
  const report = buildValidationReport(document, context.config);

  writeLine(context.stdout, formatValidationSummary(report));

  const timestamp = new Date().toISOString();
  if (report.errors.length > 0) {
    context.logger({
      name: 'catalog.validation_failed',
      path: options.catalogPath,
      timestamp,
      errors: report.errors.length,
      warnings: report.warnings.length,
      codes: [...new Set(report.errors.map((issue) => issue.code))],
    });
    return 1;
  }

  context.logger({
    name: 'catalog.validated',
    path: options.catalogPath,
    timestamp,
    upgrades: countUpgrades(document),
    warnings: report.warnings.length,
  });
  return 0;
}

export function formatRankedLine(
  ranked: RankedUpgrade,
  position: number,
  config: AdvisorConfig = DEFAULT_ADVISOR_CONFIG,
): string {
  const score = ranked.score.toFixed(config.precision.displayDecimals);
  const marker = ranked.affordable ? '' : ' (not affordable)';
  return (
    `${position}. ${ranked.upgradeName} [${ranked.category}] ` +
    `${ranked.currentLevel} → ${ranked.nextLevel} for ` +
    `${formatCost(ranked.cost)} ${config.display.currencyLabel}, ` +
    `score ${score}${marker}`
  );
}

export async function runRankCommand(
  options: RankCommandOptions,
  context: CommandContext,
): Promise<number> {
  const now = context.now ?? Date.now;
  const startedAt = now();
  const config = context.config ?? DEFAULT_ADVISOR_CONFIG;

  const catalog = await loadAdvisorCatalogFile(options.catalogPath, {
    config,
    ...(context.telemetry ? { telemetry: context.telemetry } : {}),
  });
  const research: ResearchDataset =
    options.researchPath === undefined
      ? EMPTY_RESEARCH_DATASET
      : await loadResearchFile(options.researchPath);

  const store =
    options.store ??
    createFileProfileStore(options.profilesDir, {
      catalog,
      research,
      ...(context.telemetry ? { telemetry: context.telemetry } : {}),
    });
  const profile = await store.get(options.profileId);
  if (profile === undefined) {
    writeLine(context.stderr, `Profile not found: ${options.profileId}`);
    return 1;
  }

  const strategy = createRankingStrategy(options.strategy, { config, research });
  const ranked = strategy.rank(catalog, profile);
  const shown = options.limit === undefined ? ranked : ranked.slice(0, options.limit);

  writeLine(
    context.stdout,
    `${profile.name}: ${formatCost(profile.availableCurrency)} ${config.display.currencyLabel} available (${strategy.name} v${strategy.version})`,
  );
  if (shown.length === 0) {
    writeLine(context.stdout, 'No upgrades to recommend.');
  }
  shown.forEach((entry, index) => {
    writeLine(context.stdout, formatRankedLine(entry, index + 1, config));
    if (options.explain) {
      writeLine(context.stdout, strategy.explain(entry));
    }
  });

  context.logger({
    name: 'ranking.completed',
    profileId: profile.id,
    strategy: `${strategy.name}@${strategy.version}`,
    timestamp: new Date().toISOString(),
    durationMs: now() - startedAt,
    candidates: ranked.length,
    top: ranked.slice(0, TOP_ENTRIES_LOGGED).map((entry) => ({
      upgradeId: entry.upgradeId,
      score: entry.score,
      cost: entry.cost,
      affordable: entry.affordable,
    })),
  });
  return 0;
}
