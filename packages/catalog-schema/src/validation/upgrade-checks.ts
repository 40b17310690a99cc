import type { CatalogIssue } from '../errors.js';
import type { UpgradeDefinition, UpgradeLevel } from '../modules/upgrades.js';

export const DEFAULT_EFFECT_DELTA_TOLERANCE = 1e-6;

type IssuePath = readonly (string | number)[];

const NUMERIC_LEVEL_FIELDS = ['cost', 'cumulativeEffect', 'effectDelta'] as const;

const sortedUnique = (values: Iterable<number>): number[] =>
  Array.from(new Set(values)).sort((left, right) => left - right);

/**
 * Gaps in `1..maxLevel` not covered by `present` (sorted, unique, in range).
 * Runs of three or more levels collapse to `first..last`, so the result
 * grows with the number of levels present rather than with `maxLevel`.
 */
const formatGaps = (present: readonly number[], maxLevel: number): string[] => {
  const gaps: string[] = [];
  const pushGap = (first: number, last: number): void => {
    if (first > last) {
      return;
    }
    if (last - first >= 2) {
      gaps.push(`${first}..${last}`);
      return;
    }
    for (let level = first; level <= last; level += 1) {
      gaps.push(String(level));
    }
  };

  let next = 1;
  for (const level of present) {
    pushGap(next, level - 1);
    next = level + 1;
  }
  pushGap(next, maxLevel);
  return gaps;
};

const checkContinuity = (
  upgrade: UpgradeDefinition,
  path: IssuePath,
  issues: CatalogIssue[],
): void => {
  const actual = upgrade.levels.map((entry) => entry.level);
  const contiguous =
    actual.length === upgrade.maxLevel &&
    actual.every((level, index) => level === index + 1);
  if (contiguous) {
    return;
  }

  const inRange = (level: number): boolean => level >= 1 && level <= upgrade.maxLevel;
  const missing = formatGaps(sortedUnique(actual.filter(inRange)), upgrade.maxLevel);
  const unexpected = sortedUnique(actual.filter((level) => !inRange(level)));

  if (missing.length > 0) {
    issues.push({
      code: 'upgrade.levels.missing',
      message: `${upgrade.id}: missing levels: [${missing.join(', ')}]`,
      path: [...path, 'levels'],
      severity: 'error',
    });
  }
  if (unexpected.length > 0) {
    issues.push({
      code: 'upgrade.levels.unexpected',
      message: `${upgrade.id}: unexpected levels: [${unexpected.join(', ')}]`,
      path: [...path, 'levels'],
      severity: 'error',
    });
  }
  if (missing.length === 0 && unexpected.length === 0) {
    issues.push({
      code: 'upgrade.levels.outOfOrder',
      message: `${upgrade.id}: levels must be sorted 1..${upgrade.maxLevel}, got [${actual.join(', ')}]`,
      path: [...path, 'levels'],
      severity: 'error',
    });
  }
};

const checkLevelValues = (
  upgrade: UpgradeDefinition,
  entry: UpgradeLevel,
  levelPath: IssuePath,
  issues: CatalogIssue[],
): void => {
  for (const field of NUMERIC_LEVEL_FIELDS) {
    if (!Number.isFinite(entry[field])) {
      issues.push({
        code: 'upgrade.level.nonFinite',
        message: `${upgrade.id} level ${entry.level}: ${field} is not finite`,
        path: [...levelPath, field],
        severity: 'error',
      });
    }
  }

  if (entry.cost <= 0) {
    issues.push({
      code: 'upgrade.level.nonPositiveCost',
      message: `${upgrade.id} level ${entry.level}: cost must be positive, got ${entry.cost}`,
      path: [...levelPath, 'cost'],
      severity: 'error',
    });
  }
};

/**
 * Per-upgrade integrity checks shared by the strict upgrade schema and the
 * catalog validator. Cost ordering is a hard rule; a decreasing cumulative
 * effect and a declared delta that disagrees with the effect ladder are only
 * warnings because source data rounds some plateaus.
 */
export const collectUpgradeIssues = (
  upgrade: UpgradeDefinition,
  path: IssuePath,
  effectDeltaTolerance = DEFAULT_EFFECT_DELTA_TOLERANCE,
): CatalogIssue[] => {
  const issues: CatalogIssue[] = [];
  const { levels } = upgrade;

  if (levels.length !== upgrade.maxLevel) {
    issues.push({
      code: 'upgrade.levels.countMismatch',
      message: `${upgrade.id}: level count ${levels.length} != maxLevel ${upgrade.maxLevel}`,
      path: [...path, 'levels'],
      severity: 'error',
    });
  }

  if (levels.length === 0) {
    issues.push({
      code: 'upgrade.levels.empty',
      message: `${upgrade.id}: no levels defined`,
      path: [...path, 'levels'],
      severity: 'error',
    });
    return issues;
  }

  checkContinuity(upgrade, path, issues);

  levels.forEach((entry, index) => {
    checkLevelValues(upgrade, entry, [...path, 'levels', index], issues);
  });

  levels.forEach((current, index) => {
    const previous = index === 0 ? undefined : levels[index - 1];
    const levelPath = [...path, 'levels', index];

    if (previous !== undefined && current.cost <= previous.cost) {
      issues.push({
        code: 'upgrade.cost.notIncreasing',
        message: `${upgrade.id}: cost not increasing at level ${current.level} (${previous.cost} -> ${current.cost})`,
        path: [...levelPath, 'cost'],
        severity: 'error',
      });
    }

    if (
      previous !== undefined &&
      current.cumulativeEffect < previous.cumulativeEffect
    ) {
      issues.push({
        code: 'upgrade.effect.decreasing',
        message: `${upgrade.id}: cumulativeEffect decreased at level ${current.level} (${previous.cumulativeEffect} -> ${current.cumulativeEffect})`,
        path: [...levelPath, 'cumulativeEffect'],
        severity: 'warning',
      });
    }

    const reference = previous === undefined ? upgrade.baseValue : previous.cumulativeEffect;
    const expectedDelta = current.cumulativeEffect - reference;
    if (Math.abs(current.effectDelta - expectedDelta) > effectDeltaTolerance) {
      issues.push({
        code: 'upgrade.effect.deltaMismatch',
        message: `${upgrade.id} level ${current.level}: effectDelta ${current.effectDelta} != expected ${expectedDelta.toFixed(6)}`,
        path: [...levelPath, 'effectDelta'],
        severity: 'warning',
      });
    }
  });

  return issues;
};
