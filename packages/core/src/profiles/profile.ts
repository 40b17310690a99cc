import { randomUUID } from 'node:crypto';

import type { ResearchDataset, UpgradeCatalog } from '@upgrade-advisor/catalog-schema';
import { z } from 'zod';

import { DEFAULT_ADVISOR_CONFIG } from '../config.js';
import {
  normalizeScoringWeights,
  type ScoringWeights,
  type WeightBounds,
} from '../scoring-weights.js';

export class ProfileMutationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProfileMutationError';
  }
}

export type LevelMap = Readonly<Record<string, number>>;

/**
 * One user's saved state. Every mutation helper returns a new frozen
 * snapshot with `revision` incremented and `updatedAt` refreshed.
 */
export interface Profile {
  readonly id: string;
  readonly name: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly revision: number;
  readonly availableCurrency: number;
  readonly levels: LevelMap;
  readonly researchLevels: LevelMap;
  readonly weights: ScoringWeights;
  readonly tags: readonly string[];
}

const levelMapSchema = z.record(z.number().int().nonnegative());

export const profileSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  createdAt: z.string().datetime({ offset: true }),
  updatedAt: z.string().datetime({ offset: true }),
  revision: z.number().int().nonnegative().default(1),
  availableCurrency: z.number().finite().nonnegative().default(0),
  levels: levelMapSchema.default({}),
  researchLevels: levelMapSchema.default({}),
  weights: z.record(z.number()).default({}),
  tags: z.array(z.string()).default([]),
});

export type ProfileInput = z.input<typeof profileSchema>;

export type Clock = () => Date;

export interface ProfileMutationContext {
  readonly now?: Clock;
  readonly catalog?: UpgradeCatalog;
  readonly research?: ResearchDataset;
  readonly weightBounds?: WeightBounds;
}

const systemClock: Clock = () => new Date();

export function freezeProfile(profile: Profile): Profile {
  return Object.freeze({
    ...profile,
    levels: Object.freeze({ ...profile.levels }),
    researchLevels: Object.freeze({ ...profile.researchLevels }),
    weights: Object.freeze({ ...profile.weights }),
    tags: Object.freeze([...profile.tags]),
  });
}

export function parseProfile(input: unknown): Profile {
  const parsed = profileSchema.parse(input);
  return freezeProfile({
    ...parsed,
    weights: normalizeScoringWeights(parsed.weights),
  });
}

export function safeParseProfile(
  input: unknown,
): { success: true; profile: Profile } | { success: false; error: z.ZodError } {
  const parsed = profileSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, error: parsed.error };
  }
  return {
    success: true,
    profile: freezeProfile({
      ...parsed.data,
      weights: normalizeScoringWeights(parsed.data.weights),
    }),
  };
}

export interface NewProfileOptions {
  readonly id?: string;
  readonly now?: Clock;
  readonly availableCurrency?: number;
  readonly weights?: Readonly<Record<string, unknown>>;
  readonly tags?: readonly string[];
}

export function createProfile(name: string, options: NewProfileOptions = {}): Profile {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ProfileMutationError('Profile name must not be blank');
  }
  const timestamp = (options.now ?? systemClock)().toISOString();
  return freezeProfile({
    id: options.id ?? randomUUID(),
    name: trimmed,
    createdAt: timestamp,
    updatedAt: timestamp,
    revision: 1,
    availableCurrency: clampCurrency(options.availableCurrency ?? 0),
    levels: {},
    researchLevels: {},
    weights: normalizeScoringWeights(options.weights ?? {}),
    tags: options.tags ?? [],
  });
}

function readLevel(levels: LevelMap, key: string): number {
  if (!Object.hasOwn(levels, key)) {
    return 0;
  }
  return levels[key] ?? 0;
}

/** Current level of an upgrade; absent entries are level 0. */
export function getLevel(profile: Profile, upgradeId: string): number {
  return readLevel(profile.levels, upgradeId);
}

export function getResearchLevel(profile: Profile, researchId: string): number {
  return readLevel(profile.researchLevels, researchId);
}

function nextVersion(
  profile: Profile,
  changes: Partial<Omit<Profile, 'id' | 'createdAt' | 'revision' | 'updatedAt'>>,
  now: Clock = systemClock,
): Profile {
  return freezeProfile({
    ...profile,
    ...changes,
    revision: profile.revision + 1,
    updatedAt: now().toISOString(),
  });
}

function toLevel(value: number, label: string): number {
  if (!Number.isFinite(value)) {
    throw new ProfileMutationError(`${label} must be a finite number, got ${value}`);
  }
  return Math.max(0, Math.floor(value));
}

function withLevel(levels: LevelMap, key: string, level: number): LevelMap {
  const next: Record<string, number> = { ...levels };
  if (level === 0) {
    delete next[key];
  } else {
    next[key] = level;
  }
  return next;
}

/**
 * Records a new level for `upgradeId`. With a catalog in context the id must
 * exist and the level is clamped to `[0, maxLevel]`; without one only the
 * lower bound applies. Level 0 removes the entry.
 */
export function setLevel(
  profile: Profile,
  upgradeId: string,
  level: number,
  context: ProfileMutationContext = {},
): Profile {
  let resolved = toLevel(level, `Level for ${upgradeId}`);
  if (context.catalog) {
    const upgrade = context.catalog.getUpgrade(upgradeId);
    if (upgrade === undefined) {
      throw new ProfileMutationError(`Unknown upgrade id: ${upgradeId}`);
    }
    resolved = Math.min(resolved, upgrade.maxLevel);
  }
  return nextVersion(
    profile,
    { levels: withLevel(profile.levels, upgradeId, resolved) },
    context.now,
  );
}

export function setResearchLevel(
  profile: Profile,
  researchId: string,
  level: number,
  context: ProfileMutationContext = {},
): Profile {
  let resolved = toLevel(level, `Level for ${researchId}`);
  if (context.research) {
    const research = context.research.getResearch(researchId);
    if (research === undefined) {
      throw new ProfileMutationError(`Unknown research id: ${researchId}`);
    }
    resolved = Math.min(resolved, research.maxLevel);
  }
  return nextVersion(
    profile,
    { researchLevels: withLevel(profile.researchLevels, researchId, resolved) },
    context.now,
  );
}

function clampCurrency(amount: number): number {
  if (!Number.isFinite(amount)) {
    throw new ProfileMutationError(`Currency must be a finite number, got ${amount}`);
  }
  return Math.max(0, amount);
}

export function setCurrency(
  profile: Profile,
  amount: number,
  context: ProfileMutationContext = {},
): Profile {
  return nextVersion(profile, { availableCurrency: clampCurrency(amount) }, context.now);
}

/**
 * Replaces the profile's weights. Each entry is clamped to the configured
 * bounds; categories left out fall back to neutral when scored.
 */
export function setWeights(
  profile: Profile,
  weights: Readonly<Record<string, unknown>>,
  context: ProfileMutationContext = {},
): Profile {
  return nextVersion(
    profile,
    {
      weights: normalizeScoringWeights(
        weights,
        context.weightBounds ?? DEFAULT_ADVISOR_CONFIG.weights,
      ),
    },
    context.now,
  );
}

export function setTags(
  profile: Profile,
  tags: readonly string[],
  context: ProfileMutationContext = {},
): Profile {
  const unique = [...new Set(tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0))];
  return nextVersion(profile, { tags: unique }, context.now);
}

/**
 * Copies levels, research, currency, weights and tags into a new profile
 * with its own id, name and timestamps.
 */
export function duplicateProfile(
  profile: Profile,
  name: string,
  options: Pick<NewProfileOptions, 'id' | 'now'> = {},
): Profile {
  const created = createProfile(name, options);
  return freezeProfile({
    ...profile,
    id: created.id,
    name: created.name,
    createdAt: created.createdAt,
    updatedAt: created.updatedAt,
    revision: 1,
  });
}

export function serializeProfile(profile: Profile): string {
  return `${JSON.stringify(profile, undefined, 2)}\n`;
}
