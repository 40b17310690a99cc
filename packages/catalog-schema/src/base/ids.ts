import { z } from 'zod';

const IDENTIFIER_PATTERN = /^[A-Za-z0-9][-./:\w]{0,63}$/;

const createIdentifierSchema = (label: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${label} must contain at least one character.` })
    .max(64, { message: `${label} must contain at most 64 characters.` })
    .regex(IDENTIFIER_PATTERN, {
      message: `${label} must start with an alphanumeric character and may include "-", "_", ".", "/", or ":" thereafter.`,
    });

export const upgradeIdSchema = createIdentifierSchema('Upgrade id');

export const researchIdSchema = createIdentifierSchema('Research id');

export const categorySchema = createIdentifierSchema('Category');

export const displayNameSchema = z
  .string()
  .trim()
  .min(1, { message: 'Display name must contain at least one character.' });

export const labelSchema = z
  .string()
  .trim()
  .min(1, { message: 'Label must contain at least one character.' });
