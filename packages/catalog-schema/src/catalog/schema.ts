import { z } from 'zod';

import { labelSchema } from '../base/ids.js';
import { upgradeShapeSchema } from '../modules/upgrades.js';

const provenanceShape = {
  version: labelSchema,
  dataVersion: labelSchema,
  source: labelSchema,
};

/**
 * Persisted catalog document: provenance fields plus upgrade records. Field
 * names and nesting match the on-disk data files exactly.
 */
export const catalogShapeSchema = z
  .object({
    ...provenanceShape,
    upgrades: z.array(upgradeShapeSchema),
  })
  .strict();

export type CatalogShape = z.infer<typeof catalogShapeSchema>;
export type CatalogInput = z.input<typeof catalogShapeSchema>;
