import { z } from 'zod';

import { displayNameSchema, researchIdSchema } from '../base/ids.js';
import { finiteNumberSchema, positiveIntSchema } from '../base/numbers.js';
import { CatalogValidationError, fromZodIssues } from '../errors.js';

export const boostTypeSchema = z.enum(['multiplicative', 'additive'] as const);

export type BoostType = z.infer<typeof boostTypeSchema>;

export interface ResearchLevel {
  readonly level: number;
  readonly value: number;
}

export interface ResearchDefinition {
  readonly id: string;
  readonly name: string;
  readonly boostType: BoostType;
  readonly maxLevel: number;
  readonly levels: readonly ResearchLevel[];
}

export const researchLevelSchema = z
  .object({
    level: positiveIntSchema,
    value: finiteNumberSchema,
  })
  .strict();

export const researchDefinitionSchema = z
  .object({
    id: researchIdSchema,
    name: displayNameSchema,
    boostType: boostTypeSchema,
    maxLevel: positiveIntSchema,
    levels: z.array(researchLevelSchema),
  })
  .strict()
  .superRefine((research, ctx) => {
    if (research.levels.length !== research.maxLevel) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['levels'],
        message: `levels list length (${research.levels.length}) must equal maxLevel (${research.maxLevel})`,
      });
    }
    research.levels.forEach((entry, index) => {
      if (entry.level !== index + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['levels', index, 'level'],
          message: `levels must be sorted by level: expected level ${index + 1} at index ${index}, got ${entry.level}`,
        });
      }
    });
  })
  .transform(
    (research): ResearchDefinition =>
      Object.freeze({
        ...research,
        levels: Object.freeze(research.levels.map((entry) => Object.freeze({ ...entry }))),
      }),
  );

const researchListSchema = z
  .array(researchDefinitionSchema)
  .superRefine((researches, ctx) => {
    const seen = new Set<string>();
    researches.forEach((research, index) => {
      if (seen.has(research.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate research id: ${research.id}`,
        });
      }
      seen.add(research.id);
    });
  });

/**
 * Research documents are stored either as `{ "researches": [...] }` or as a
 * bare list of research records.
 */
export const researchDocumentSchema = z.union([
  z.object({ researches: researchListSchema }).strict(),
  researchListSchema.transform((researches) => ({ researches })),
]);

export type ResearchInput = z.input<typeof researchDefinitionSchema>;

export const MULTIPLICATIVE_NEUTRAL = 1;
export const ADDITIVE_NEUTRAL = 0;

export interface ResearchDataset {
  readonly researches: readonly ResearchDefinition[];
  getResearch(researchId: string): ResearchDefinition | undefined;
  /**
   * Research value at `level`. An unknown research id yields the
   * multiplicative neutral 1.0; a known research below level 1 yields the
   * neutral of its own boost type (1.0 multiplicative, 0.0 additive).
   * Levels past the table clamp to its last entry.
   */
  getValue(researchId: string, level: number): number;
}

const neutralFor = (research: ResearchDefinition): number =>
  research.boostType === 'multiplicative' ? MULTIPLICATIVE_NEUTRAL : ADDITIVE_NEUTRAL;

export const createResearchDataset = (
  researches: readonly ResearchDefinition[],
): ResearchDataset => {
  const byId = new Map<string, ResearchDefinition>();
  researches.forEach((research) => byId.set(research.id, research));

  return Object.freeze({
    researches: Object.freeze([...researches]),
    getResearch: (researchId: string) => byId.get(researchId),
    getValue: (researchId: string, level: number) => {
      const research = byId.get(researchId);
      if (research === undefined) {
        return MULTIPLICATIVE_NEUTRAL;
      }
      if (level <= 0) {
        return neutralFor(research);
      }
      const index =
        Math.min(Math.floor(level), research.maxLevel, research.levels.length) - 1;
      const entry = index < 0 ? undefined : research.levels[index];
      return entry === undefined ? neutralFor(research) : entry.value;
    },
  });
};

export const EMPTY_RESEARCH_DATASET: ResearchDataset = createResearchDataset([]);

export const loadResearch = (input: unknown): ResearchDataset => {
  const parsed = researchDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogValidationError(
      'Research document does not match the research schema.',
      fromZodIssues(parsed.error.issues),
    );
  }
  return createResearchDataset(parsed.data.researches);
};
