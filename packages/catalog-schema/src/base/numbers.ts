import { z } from 'zod';

const NUMBER_TYPE_MESSAGE = 'Value must be a number, not a string or other type.';
const FINITE_NUMBER_MESSAGE = 'Value must be a finite number.';
const POSITIVE_NUMBER_MESSAGE = 'Value must be greater than 0.';
const NONNEGATIVE_INTEGER_MESSAGE =
  'Value must be an integer greater than or equal to 0.';
const POSITIVE_INTEGER_MESSAGE =
  'Value must be a positive integer greater than 0.';

// Catalog numbers are never coerced: a string such as "1.2M" must be
// converted before it reaches this layer.
const numberSchema = z.number({
  invalid_type_error: NUMBER_TYPE_MESSAGE,
  required_error: 'Value is required.',
});

export const finiteNumberSchema = numberSchema.refine(Number.isFinite, {
  message: FINITE_NUMBER_MESSAGE,
});

export const positiveNumberSchema = finiteNumberSchema.refine(
  (value) => value > 0,
  { message: POSITIVE_NUMBER_MESSAGE },
);

export const nonNegativeIntSchema = finiteNumberSchema.refine(
  (value) => Number.isInteger(value) && value >= 0,
  { message: NONNEGATIVE_INTEGER_MESSAGE },
);

export const positiveIntSchema = finiteNumberSchema.refine(
  (value) => Number.isInteger(value) && value > 0,
  { message: POSITIVE_INTEGER_MESSAGE },
);

/**
 * Accepts any JSON number, finite or not. Used for per-level fields whose
 * finiteness and sign are reported by the catalog validator with upgrade
 * context instead of a bare schema message.
 */
export const numericValueSchema = numberSchema;
