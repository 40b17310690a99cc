import { z } from 'zod';

import {
  categorySchema,
  displayNameSchema,
  labelSchema,
  upgradeIdSchema,
} from '../base/ids.js';
import {
  finiteNumberSchema,
  nonNegativeIntSchema,
  numericValueSchema,
  positiveIntSchema,
} from '../base/numbers.js';
import { collectUpgradeIssues } from '../validation/upgrade-checks.js';

export const effectTypeSchema = z.enum(['additive', 'multiplicative'] as const);

export type EffectType = z.infer<typeof effectTypeSchema>;

export interface UpgradeLevel {
  readonly level: number;
  readonly cost: number;
  readonly cumulativeEffect: number;
  readonly effectDelta: number;
}

export interface UpgradeDefinition {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly effectUnit?: string;
  readonly effectType: EffectType;
  readonly baseValue: number;
  readonly maxLevel: number;
  readonly displayOrder: number;
  readonly levels: readonly UpgradeLevel[];
}

export const upgradeLevelSchema = z
  .object({
    level: numericValueSchema,
    cost: numericValueSchema,
    cumulativeEffect: numericValueSchema,
    effectDelta: numericValueSchema,
  })
  .strict();

/**
 * Structural shape of an upgrade record. Level data is only type-checked
 * here; its integrity rules live in {@link collectUpgradeIssues}.
 */
export const upgradeShapeSchema = z
  .object({
    id: upgradeIdSchema,
    name: displayNameSchema,
    category: categorySchema,
    effectUnit: labelSchema.optional(),
    effectType: effectTypeSchema,
    baseValue: finiteNumberSchema,
    maxLevel: positiveIntSchema,
    displayOrder: nonNegativeIntSchema,
    levels: z.array(upgradeLevelSchema),
  })
  .strict();

export type UpgradeInput = z.input<typeof upgradeShapeSchema>;

export const freezeUpgrade = (upgrade: UpgradeDefinition): UpgradeDefinition =>
  Object.freeze({
    id: upgrade.id,
    name: upgrade.name,
    category: upgrade.category,
    ...(upgrade.effectUnit === undefined ? {} : { effectUnit: upgrade.effectUnit }),
    effectType: upgrade.effectType,
    baseValue: upgrade.baseValue,
    maxLevel: upgrade.maxLevel,
    displayOrder: upgrade.displayOrder,
    levels: Object.freeze(
      upgrade.levels.map((level) =>
        Object.freeze({
          level: level.level,
          cost: level.cost,
          cumulativeEffect: level.cumulativeEffect,
          effectDelta: level.effectDelta,
        }),
      ),
    ),
  });

/**
 * Fully validated upgrade: the structural shape plus the hard level
 * invariants (count, contiguity, finite values, strictly increasing cost).
 * Soft anomalies are left to the catalog validator report.
 */
export const upgradeDefinitionSchema = upgradeShapeSchema
  .superRefine((upgrade, ctx) => {
    collectUpgradeIssues(upgrade, [])
      .filter((issue) => issue.severity === 'error')
      .forEach((issue) => {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...issue.path],
          message: issue.message,
        });
      });
  })
  .transform((upgrade) => freezeUpgrade(upgrade));
