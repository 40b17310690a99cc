import type { CatalogIssue } from '../errors.js';
import type { CatalogValidationReport } from './validate-catalog.js';

const RAW_NUMERIC_LEVEL_FIELDS = ['cost', 'cumulativeEffect', 'effectDelta'] as const;

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stringValueIssue = (
  label: string,
  value: string,
  path: readonly (string | number)[],
): CatalogIssue => ({
  code: 'raw.stringNumber',
  message: `${label}: string value '${value}' (expected numeric)`,
  path,
  severity: 'error',
});

/**
 * Inspects an untyped catalog document before schema parsing. Acquired data
 * often carries abbreviations such as "1.2M" that must be converted to
 * numbers upstream; every such string in a cost or effect field is an error.
 */
export const validateRawCatalog = (input: unknown): CatalogValidationReport => {
  const errors: CatalogIssue[] = [];

  if (!isRecord(input)) {
    errors.push({
      code: 'raw.document.notObject',
      message: 'Top-level data must be an object',
      path: [],
      severity: 'error',
    });
    return { errors, warnings: [] };
  }

  const upgrades = input.upgrades;
  if (!Array.isArray(upgrades)) {
    errors.push({
      code: 'raw.upgrades.notArray',
      message: "'upgrades' must be a list",
      path: ['upgrades'],
      severity: 'error',
    });
    return { errors, warnings: [] };
  }

  upgrades.forEach((item: unknown, index) => {
    const itemPath = ['upgrades', index] as const;
    if (!isRecord(item)) {
      errors.push({
        code: 'raw.upgrade.notObject',
        message: `upgrades[${index}] must be an object`,
        path: itemPath,
        severity: 'error',
      });
      return;
    }

    const label = typeof item.name === 'string' ? item.name : `upgrades[${index}]`;

    if (typeof item.baseValue === 'string') {
      errors.push(stringValueIssue(`${label}.baseValue`, item.baseValue, [...itemPath, 'baseValue']));
    }

    const levels = item.levels;
    if (!Array.isArray(levels)) {
      errors.push({
        code: 'raw.levels.notArray',
        message: `${label}: 'levels' must be a list`,
        path: [...itemPath, 'levels'],
        severity: 'error',
      });
      return;
    }

    levels.forEach((entry: unknown, levelIndex) => {
      const levelPath = [...itemPath, 'levels', levelIndex] as const;
      if (!isRecord(entry)) {
        errors.push({
          code: 'raw.level.notObject',
          message: `${label} levels[${levelIndex}]: must be an object`,
          path: levelPath,
          severity: 'error',
        });
        return;
      }

      RAW_NUMERIC_LEVEL_FIELDS.forEach((field) => {
        const value = entry[field];
        if (typeof value === 'string') {
          errors.push(
            stringValueIssue(`${label} levels[${levelIndex}].${field}`, value, [...levelPath, field]),
          );
        }
      });
    });
  });

  return { errors, warnings: [] };
};
