import { describe, expect, it } from 'vitest';

import { validateRawCatalog } from './validate-raw.js';

describe('validateRawCatalog', () => {
  it('accepts numeric documents', () => {
    const report = validateRawCatalog({
      upgrades: [
        {
          name: 'Damage',
          baseValue: 0,
          levels: [{ level: 1, cost: 50, cumulativeEffect: 5, effectDelta: 5 }],
        },
      ],
    });

    expect(report.errors).toEqual([]);
  });

  it('rejects a document that is not an object', () => {
    expect(validateRawCatalog([]).errors.map((issue) => issue.message)).toEqual([
      'Top-level data must be an object',
    ]);
    expect(validateRawCatalog(null).errors).toHaveLength(1);
  });

  it('requires an upgrades list', () => {
    expect(validateRawCatalog({ upgrades: {} }).errors.map((issue) => issue.message)).toEqual([
      "'upgrades' must be a list",
    ]);
  });

  it('reports every abbreviated number with its location', () => {
    const report = validateRawCatalog({
      upgrades: [
        {
          name: 'Damage',
          baseValue: 0,
          levels: [
            { level: 1, cost: 50, cumulativeEffect: 5, effectDelta: 5 },
            { level: 2, cost: '1.2M', cumulativeEffect: '10', effectDelta: 5 },
          ],
        },
        { baseValue: '1K', levels: [] },
      ],
    });

    expect(report.errors.map((issue) => issue.message)).toEqual([
      "Damage levels[1].cost: string value '1.2M' (expected numeric)",
      "Damage levels[1].cumulativeEffect: string value '10' (expected numeric)",
      "upgrades[1].baseValue: string value '1K' (expected numeric)",
    ]);
    expect(report.errors[0]?.path).toEqual(['upgrades', 0, 'levels', 1, 'cost']);
    expect(report.errors.every((issue) => issue.code === 'raw.stringNumber')).toBe(true);
  });

  it('reports malformed upgrade and level entries', () => {
    const report = validateRawCatalog({
      upgrades: [42, { name: 'Health', levels: 'none' }, { name: 'Interest', levels: [7] }],
    });

    expect(report.errors.map((issue) => issue.code)).toEqual([
      'raw.upgrade.notObject',
      'raw.levels.notArray',
      'raw.level.notObject',
    ]);
    expect(report.errors.map((issue) => issue.message)).toEqual([
      'upgrades[0] must be an object',
      "Health: 'levels' must be a list",
      'Interest levels[0]: must be an object',
    ]);
  });
});
