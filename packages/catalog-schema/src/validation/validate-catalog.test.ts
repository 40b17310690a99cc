import { describe, expect, it, vi } from 'vitest';

import {
  buildCatalogInput,
  buildUpgradeInput,
  quietOptions,
} from '../__fixtures__/catalogs.js';
import { createLevelLadder } from '../factories.js';
import type { CatalogIssue } from '../errors.js';
import {
  formatValidationSummary,
  isCatalogUsable,
  validateCatalog,
} from './validate-catalog.js';

const messages = (issues: readonly CatalogIssue[]) => issues.map((issue) => issue.message);
const codes = (issues: readonly CatalogIssue[]) => issues.map((issue) => issue.code);

describe('validateCatalog', () => {
  it('accepts a well-formed catalog', () => {
    const report = validateCatalog(buildCatalogInput(), quietOptions);

    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual([]);
    expect(isCatalogUsable(report)).toBe(true);
  });

  it('warns about small catalogs under default options', () => {
    const report = validateCatalog(buildCatalogInput());

    expect(report.errors).toEqual([]);
    expect(messages(report.warnings)).toEqual([
      'Only 3 upgrades (expected at least 10)',
    ]);
  });

  it('rejects an empty catalog and stops there', () => {
    const report = validateCatalog({ upgrades: [] });

    expect(messages(report.errors)).toEqual(['No upgrades in catalog']);
    expect(report.warnings).toEqual([]);
    expect(isCatalogUsable(report)).toBe(false);
  });

  it('reports duplicate ids as errors and duplicate names and orders as warnings', () => {
    const report = validateCatalog(
      buildCatalogInput([buildUpgradeInput(), buildUpgradeInput()]),
      quietOptions,
    );

    expect(codes(report.errors)).toEqual(['catalog.duplicateId']);
    expect(report.errors[0]?.path).toEqual(['upgrades', 1, 'id']);
    expect(messages(report.warnings)).toEqual([
      'Duplicate upgrade name: Damage',
      'Duplicate displayOrder 1 in attack',
    ]);
  });

  it('allows the same displayOrder in different categories', () => {
    const report = validateCatalog(
      buildCatalogInput([
        buildUpgradeInput(),
        buildUpgradeInput({ id: 'health', name: 'Health', category: 'defense' }),
      ]),
      quietOptions,
    );

    expect(report.warnings).toEqual([]);
  });

  it('warns once per missing expected category', () => {
    const report = validateCatalog(buildCatalogInput([buildUpgradeInput()]), {
      minimumUpgradeCount: 1,
    });

    expect(messages(report.warnings)).toEqual([
      'Missing expected category: defense',
      'Missing expected category: utility',
    ]);
  });

  it('reports a level count that disagrees with maxLevel', () => {
    const report = validateCatalog(
      buildCatalogInput([buildUpgradeInput({ maxLevel: 4 })]),
      quietOptions,
    );

    expect(messages(report.errors)).toEqual([
      'damage: level count 3 != maxLevel 4',
      'damage: missing levels: [4]',
    ]);
  });

  it('collapses long runs of missing levels', () => {
    const report = validateCatalog(
      buildCatalogInput([
        buildUpgradeInput({
          maxLevel: 20_000_000,
          levels: createLevelLadder(0, [{ cost: 50, effect: 5 }]),
        }),
      ]),
      quietOptions,
    );

    expect(messages(report.errors)).toEqual([
      'damage: level count 1 != maxLevel 20000000',
      'damage: missing levels: [2..20000000]',
    ]);
  });

  it('lists short gaps level by level', () => {
    const levels = createLevelLadder(0, [
      { cost: 50, effect: 5 },
      { cost: 120, effect: 10 },
      { cost: 250, effect: 16 },
    ]).map((entry, index) => ({ ...entry, level: [1, 4, 8][index] ?? entry.level }));

    const report = validateCatalog(
      buildCatalogInput([buildUpgradeInput({ maxLevel: 8, levels })]),
      quietOptions,
    );

    expect(messages(report.errors)).toEqual([
      'damage: level count 3 != maxLevel 8',
      'damage: missing levels: [2, 3, 5..7]',
    ]);
  });

  it('reports an upgrade without levels once', () => {
    const report = validateCatalog(
      buildCatalogInput([buildUpgradeInput({ maxLevel: 1, levels: [] })]),
      quietOptions,
    );

    expect(messages(report.errors)).toEqual([
      'damage: level count 0 != maxLevel 1',
      'damage: no levels defined',
    ]);
  });

  it('reports levels that are present but out of order', () => {
    const levels = createLevelLadder(0, [
      { cost: 50, effect: 5 },
      { cost: 120, effect: 10 },
      { cost: 250, effect: 16 },
    ]).map((entry, index) => ({ ...entry, level: [1, 3, 2][index] ?? entry.level }));

    const report = validateCatalog(
      buildCatalogInput([buildUpgradeInput({ levels })]),
      quietOptions,
    );

    expect(messages(report.errors)).toEqual([
      'damage: levels must be sorted 1..3, got [1, 3, 2]',
    ]);
  });

  it('reports unexpected level numbers', () => {
    const levels = createLevelLadder(0, [
      { cost: 50, effect: 5 },
      { cost: 120, effect: 10 },
      { cost: 250, effect: 16 },
    ]).map((entry) => ({ ...entry, level: entry.level + 1 }));

    const report = validateCatalog(
      buildCatalogInput([buildUpgradeInput({ levels })]),
      quietOptions,
    );

    expect(messages(report.errors)).toEqual([
      'damage: missing levels: [1]',
      'damage: unexpected levels: [4]',
    ]);
  });

  it('rejects costs that do not strictly increase', () => {
    const report = validateCatalog(
      buildCatalogInput([
        buildUpgradeInput({
          levels: createLevelLadder(0, [
            { cost: 50, effect: 5 },
            { cost: 50, effect: 10 },
            { cost: 250, effect: 16 },
          ]),
        }),
      ]),
      quietOptions,
    );

    expect(messages(report.errors)).toEqual([
      'damage: cost not increasing at level 2 (50 -> 50)',
    ]);
    expect(report.errors[0]?.path).toEqual(['upgrades', 0, 'levels', 1, 'cost']);
  });

  it('rejects non-positive costs', () => {
    const report = validateCatalog(
      buildCatalogInput([
        buildUpgradeInput({
          levels: createLevelLadder(0, [
            { cost: 0, effect: 5 },
            { cost: 120, effect: 10 },
            { cost: 250, effect: 16 },
          ]),
        }),
      ]),
      quietOptions,
    );

    expect(messages(report.errors)).toEqual([
      'damage level 1: cost must be positive, got 0',
    ]);
  });

  it('rejects non-finite level values', () => {
    const levels = createLevelLadder(0, [
      { cost: 50, effect: 5 },
      { cost: 120, effect: 10 },
      { cost: 250, effect: 16 },
    ]).map((entry) =>
      entry.level === 2 ? { ...entry, effectDelta: Number.NaN } : entry,
    );

    const report = validateCatalog(
      buildCatalogInput([buildUpgradeInput({ levels })]),
      quietOptions,
    );

    expect(messages(report.errors)).toEqual([
      'damage level 2: effectDelta is not finite',
    ]);
  });

  it('treats a decreasing cumulative effect as a warning only', () => {
    const report = validateCatalog(
      buildCatalogInput([
        buildUpgradeInput({
          levels: createLevelLadder(0, [
            { cost: 50, effect: 5 },
            { cost: 120, effect: 10 },
            { cost: 250, effect: 8 },
          ]),
        }),
      ]),
      quietOptions,
    );

    expect(report.errors).toEqual([]);
    expect(messages(report.warnings)).toEqual([
      'damage: cumulativeEffect decreased at level 3 (10 -> 8)',
    ]);
  });

  it('warns when a declared effectDelta disagrees with the ladder', () => {
    const levels = createLevelLadder(0, [
      { cost: 50, effect: 5 },
      { cost: 120, effect: 10 },
      { cost: 250, effect: 16 },
    ]).map((entry) => (entry.level === 2 ? { ...entry, effectDelta: 4 } : entry));
    const catalog = buildCatalogInput([buildUpgradeInput({ levels })]);

    const strict = validateCatalog(catalog, quietOptions);
    const tolerant = validateCatalog(catalog, { ...quietOptions, effectDeltaTolerance: 2 });

    expect(messages(strict.warnings)).toEqual([
      'damage level 2: effectDelta 4 != expected 5.000000',
    ]);
    expect(tolerant.warnings).toEqual([]);
  });

  it('compares the first delta against the base value', () => {
    const report = validateCatalog(
      buildCatalogInput([buildUpgradeInput({ baseValue: 1 })]),
      quietOptions,
    );

    expect(messages(report.warnings)).toEqual([
      'damage level 1: effectDelta 5 != expected 4.000000',
    ]);
  });

  it('forwards every issue to the sink in report order', () => {
    const sink = vi.fn<(issue: CatalogIssue) => void>();
    const report = validateCatalog(
      buildCatalogInput([buildUpgradeInput(), buildUpgradeInput()]),
      quietOptions,
      sink,
    );

    expect(sink).toHaveBeenCalledTimes(
      report.errors.length + report.warnings.length,
    );
    expect(sink.mock.calls.map(([issue]) => issue.code)).toEqual([
      'catalog.duplicateId',
      'catalog.duplicateName',
      'catalog.duplicateDisplayOrder',
    ]);
  });
});

describe('formatValidationSummary', () => {
  it('lists errors before warnings', () => {
    const summary = formatValidationSummary({
      errors: [
        { code: 'catalog.duplicateId', message: 'Duplicate upgrade id: damage', path: [], severity: 'error' },
      ],
      warnings: [
        { code: 'catalog.smallUpgradeCount', message: 'Only 2 upgrades (expected at least 10)', path: [], severity: 'warning' },
      ],
    });

    expect(summary).toBe(
      [
        'ERRORS (1):',
        '  - Duplicate upgrade id: damage',
        'WARNINGS (1):',
        '  - Only 2 upgrades (expected at least 10)',
      ].join('\n'),
    );
  });

  it('reports a clean catalog', () => {
    expect(formatValidationSummary({ errors: [], warnings: [] })).toBe('All checks passed.');
  });
});
