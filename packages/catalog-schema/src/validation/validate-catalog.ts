import type { CatalogIssue } from '../errors.js';
import type { UpgradeDefinition } from '../modules/upgrades.js';
import {
  collectUpgradeIssues,
  DEFAULT_EFFECT_DELTA_TOLERANCE,
} from './upgrade-checks.js';

export const DEFAULT_EXPECTED_CATEGORIES: readonly string[] = Object.freeze([
  'attack',
  'defense',
  'utility',
]);

export const DEFAULT_MINIMUM_UPGRADE_COUNT = 10;

export interface CatalogValidationOptions {
  /**
   * Categories that a complete catalog is expected to cover. A missing
   * category is reported as a warning, never an error.
   */
  readonly expectedCategories?: readonly string[];
  /**
   * Catalogs with fewer upgrades than this produce a warning.
   */
  readonly minimumUpgradeCount?: number;
  /**
   * Allowed absolute difference between a declared `effectDelta` and the
   * difference of consecutive cumulative effects.
   */
  readonly effectDeltaTolerance?: number;
}

export interface CatalogValidationReport {
  readonly errors: readonly CatalogIssue[];
  readonly warnings: readonly CatalogIssue[];
}

export interface CatalogLike {
  readonly upgrades: readonly UpgradeDefinition[];
}

type IssueSink = (issue: CatalogIssue) => void;

const recordIssue = (
  issue: CatalogIssue,
  warnings: CatalogIssue[],
  errors: CatalogIssue[],
  sink?: IssueSink,
) => {
  sink?.(issue);
  if (issue.severity === 'warning') {
    warnings.push(issue);
  } else {
    errors.push(issue);
  }
};

const freezeReport = (
  errors: CatalogIssue[],
  warnings: CatalogIssue[],
): CatalogValidationReport =>
  Object.freeze({
    errors: Object.freeze(errors),
    warnings: Object.freeze(warnings),
  });

/**
 * Runs the catalog integrity checks. The catalog is usable only when the
 * returned `errors` list is empty; warnings are for human review.
 */
export const validateCatalog = (
  catalog: CatalogLike,
  options: CatalogValidationOptions = {},
  sink?: IssueSink,
): CatalogValidationReport => {
  const errors: CatalogIssue[] = [];
  const warnings: CatalogIssue[] = [];
  const record = (issue: CatalogIssue) => recordIssue(issue, warnings, errors, sink);

  const expectedCategories = options.expectedCategories ?? DEFAULT_EXPECTED_CATEGORIES;
  const minimumUpgradeCount =
    options.minimumUpgradeCount ?? DEFAULT_MINIMUM_UPGRADE_COUNT;
  const tolerance = options.effectDeltaTolerance ?? DEFAULT_EFFECT_DELTA_TOLERANCE;

  if (catalog.upgrades.length === 0) {
    record({
      code: 'catalog.empty',
      message: 'No upgrades in catalog',
      path: ['upgrades'],
      severity: 'error',
    });
    return freezeReport(errors, warnings);
  }

  const seenIds = new Set<string>();
  const seenNames = new Set<string>();
  const seenOrders = new Map<string, Set<number>>();

  catalog.upgrades.forEach((upgrade, index) => {
    const path = ['upgrades', index] as const;

    if (seenIds.has(upgrade.id)) {
      record({
        code: 'catalog.duplicateId',
        message: `Duplicate upgrade id: ${upgrade.id}`,
        path: [...path, 'id'],
        severity: 'error',
      });
    }
    seenIds.add(upgrade.id);

    if (seenNames.has(upgrade.name)) {
      record({
        code: 'catalog.duplicateName',
        message: `Duplicate upgrade name: ${upgrade.name}`,
        path: [...path, 'name'],
        severity: 'warning',
      });
    }
    seenNames.add(upgrade.name);

    let categoryOrders = seenOrders.get(upgrade.category);
    if (categoryOrders === undefined) {
      categoryOrders = new Set<number>();
      seenOrders.set(upgrade.category, categoryOrders);
    }
    if (categoryOrders.has(upgrade.displayOrder)) {
      record({
        code: 'catalog.duplicateDisplayOrder',
        message: `Duplicate displayOrder ${upgrade.displayOrder} in ${upgrade.category}`,
        path: [...path, 'displayOrder'],
        severity: 'warning',
      });
    }
    categoryOrders.add(upgrade.displayOrder);

    collectUpgradeIssues(upgrade, path, tolerance).forEach(record);
  });

  if (catalog.upgrades.length < minimumUpgradeCount) {
    record({
      code: 'catalog.smallUpgradeCount',
      message: `Only ${catalog.upgrades.length} upgrades (expected at least ${minimumUpgradeCount})`,
      path: ['upgrades'],
      severity: 'warning',
    });
  }

  const categories = new Set(catalog.upgrades.map((upgrade) => upgrade.category));
  expectedCategories.forEach((category) => {
    if (!categories.has(category)) {
      record({
        code: 'catalog.missingCategory',
        message: `Missing expected category: ${category}`,
        path: ['upgrades'],
        severity: 'warning',
      });
    }
  });

  return freezeReport(errors, warnings);
};

export const isCatalogUsable = (report: CatalogValidationReport): boolean =>
  report.errors.length === 0;

export const formatValidationSummary = (report: CatalogValidationReport): string => {
  const lines: string[] = [];
  if (report.errors.length > 0) {
    lines.push(`ERRORS (${report.errors.length}):`);
    report.errors.forEach((issue) => lines.push(`  - ${issue.message}`));
  }
  if (report.warnings.length > 0) {
    lines.push(`WARNINGS (${report.warnings.length}):`);
    report.warnings.forEach((issue) => lines.push(`  - ${issue.message}`));
  }
  if (lines.length === 0) {
    lines.push('All checks passed.');
  }
  return lines.join('\n');
};
