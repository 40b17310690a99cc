import type { z } from 'zod';

export class CatalogSchemaError extends Error {
  constructor(message = 'Upgrade catalog validation failed') {
    super(message);
    this.name = 'CatalogSchemaError';
  }
}

export class CatalogValidationError extends CatalogSchemaError {
  constructor(
    message: string,
    readonly issues: readonly CatalogIssue[],
  ) {
    super(message);
    this.name = 'CatalogValidationError';
  }
}

export class CatalogNotFoundError extends CatalogSchemaError {
  constructor(readonly filePath: string) {
    super(`Upgrade data not found: ${filePath}`);
    this.name = 'CatalogNotFoundError';
  }
}

export type CatalogIssueSeverity = 'error' | 'warning';

export interface CatalogIssue {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: CatalogIssueSeverity;
  readonly issues?: readonly z.ZodIssue[];
}

/**
 * Converts zod issues into catalog issues so that structural parse failures
 * are reported through the same channel as integrity checks.
 */
export const fromZodIssues = (
  issues: readonly z.ZodIssue[],
): readonly CatalogIssue[] =>
  issues.map((issue) => ({
    code: 'schema.invalid',
    message:
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    path: issue.path,
    severity: 'error' as const,
    issues: [issue],
  }));
