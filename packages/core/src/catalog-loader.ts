import {
  loadCatalog,
  readDataFile,
  type CatalogIssue,
  type CatalogLoadOptions,
  type UpgradeCatalog,
} from '@upgrade-advisor/catalog-schema';

import { DEFAULT_ADVISOR_CONFIG, type AdvisorConfig } from './config.js';
import { telemetry as defaultTelemetry, type TelemetryFacade } from './telemetry.js';

export interface AdvisorCatalogOptions {
  readonly config?: AdvisorConfig;
  readonly telemetry?: TelemetryFacade;
}

export function catalogLoadOptions(
  config: AdvisorConfig,
  facade: TelemetryFacade,
): CatalogLoadOptions {
  return {
    expectedCategories: config.catalog.expectedCategories,
    minimumUpgradeCount: config.catalog.minimumUpgradeCount,
    effectDeltaTolerance: config.precision.effectDeltaTolerance,
    warningSink: (warning: CatalogIssue) => {
      facade.recordWarning('catalog.warning', {
        code: warning.code,
        message: warning.message,
        path: warning.path.join('.'),
      });
    },
  };
}

/**
 * Validates a catalog document with the configured expectations. Warnings
 * are reported through telemetry; blocking issues throw
 * `CatalogValidationError`.
 */
export function loadAdvisorCatalog(
  document: unknown,
  options: AdvisorCatalogOptions = {},
): UpgradeCatalog {
  const config = options.config ?? DEFAULT_ADVISOR_CONFIG;
  const facade = options.telemetry ?? defaultTelemetry;
  const catalog = loadCatalog(document, catalogLoadOptions(config, facade));
  facade.recordProgress('catalog.loaded', {
    version: catalog.version,
    dataVersion: catalog.dataVersion,
    upgrades: catalog.upgrades.length,
  });
  return catalog;
}

export async function loadAdvisorCatalogFile(
  filePath: string,
  options: AdvisorCatalogOptions = {},
): Promise<UpgradeCatalog> {
  return loadAdvisorCatalog(await readDataFile(filePath), options);
}
