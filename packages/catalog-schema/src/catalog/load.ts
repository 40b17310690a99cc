import { promises as fsPromises } from 'node:fs';

import JSON5 from 'json5';

import {
  CatalogNotFoundError,
  CatalogValidationError,
  fromZodIssues,
  type CatalogIssue,
} from '../errors.js';
import { isNodeError } from '../fs/atomic-write.js';
import { loadResearch, type ResearchDataset } from '../modules/research.js';
import {
  validateCatalog,
  type CatalogValidationOptions,
} from '../validation/validate-catalog.js';
import { validateRawCatalog } from '../validation/validate-raw.js';
import { createUpgradeCatalog, type UpgradeCatalog } from './catalog.js';
import { catalogShapeSchema } from './schema.js';

export interface CatalogLoadOptions extends CatalogValidationOptions {
  /**
   * Receives every non-blocking warning found while loading.
   */
  readonly warningSink?: (warning: CatalogIssue) => void;
}

export type CatalogLoadSuccess = {
  readonly success: true;
  readonly catalog: UpgradeCatalog;
  readonly warnings: readonly CatalogIssue[];
};

export type CatalogLoadFailure = {
  readonly success: false;
  readonly error: CatalogValidationError;
};

export type CatalogLoadResult = CatalogLoadSuccess | CatalogLoadFailure;

const fail = (message: string, issues: readonly CatalogIssue[]): CatalogLoadFailure => ({
  success: false,
  error: new CatalogValidationError(message, issues),
});

/**
 * Runs a candidate catalog document through the raw-value check, the schema
 * and the integrity validator. Only a document with no blocking errors
 * becomes an {@link UpgradeCatalog}.
 */
export const safeLoadCatalog = (
  input: unknown,
  options: CatalogLoadOptions = {},
): CatalogLoadResult => {
  const raw = validateRawCatalog(input);
  if (raw.errors.length > 0) {
    return fail('Catalog document contains non-numeric values.', raw.errors);
  }

  const parsed = catalogShapeSchema.safeParse(input);
  if (!parsed.success) {
    return fail('Catalog document does not match the catalog schema.', fromZodIssues(parsed.error.issues));
  }

  const report = validateCatalog(parsed.data, options);
  if (report.errors.length > 0) {
    return fail('Catalog failed integrity validation.', report.errors);
  }

  report.warnings.forEach((warning) => options.warningSink?.(warning));

  return {
    success: true,
    catalog: createUpgradeCatalog(parsed.data),
    warnings: report.warnings,
  };
};

export const loadCatalog = (
  input: unknown,
  options: CatalogLoadOptions = {},
): UpgradeCatalog => {
  const result = safeLoadCatalog(input, options);
  if (!result.success) {
    throw result.error;
  }
  return result.catalog;
};

/**
 * Parses catalog text. JSON5 is accepted so hand-maintained catalogs may
 * carry comments; syntax errors propagate unchanged.
 */
export const parseCatalogText = (
  text: string,
  options: CatalogLoadOptions = {},
): UpgradeCatalog => {
  const document: unknown = JSON5.parse(text);
  return loadCatalog(document, options);
};

export async function readDataFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fsPromises.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new CatalogNotFoundError(filePath);
    }
    throw error;
  }
  const document: unknown = JSON5.parse(text);
  return document;
}

export async function loadCatalogFile(
  filePath: string,
  options: CatalogLoadOptions = {},
): Promise<UpgradeCatalog> {
  return loadCatalog(await readDataFile(filePath), options);
}

export async function loadResearchFile(filePath: string): Promise<ResearchDataset> {
  return loadResearch(await readDataFile(filePath));
}
