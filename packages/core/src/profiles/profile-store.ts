import {
  createProfile,
  duplicateProfile,
  freezeProfile,
  setCurrency,
  setLevel,
  setWeights,
  type Clock,
  type Profile,
  type ProfileMutationContext,
} from './profile.js';

/**
 * Storage collaborator for profiles. Update methods resolve to `undefined`
 * when the profile does not exist; input errors reject with
 * `ProfileMutationError`.
 */
export interface ProfileStore {
  /** All readable profiles, sorted by case-insensitive name. */
  list(): Promise<readonly Profile[]>;
  get(profileId: string): Promise<Profile | undefined>;
  create(name: string): Promise<Profile>;
  /** Persists `profile` with a refreshed `updatedAt`. */
  save(profile: Profile): Promise<Profile>;
  delete(profileId: string): Promise<boolean>;
  duplicate(profileId: string, name: string): Promise<Profile | undefined>;
  updateLevel(profileId: string, upgradeId: string, level: number): Promise<Profile | undefined>;
  updateCurrency(profileId: string, amount: number): Promise<Profile | undefined>;
  updateWeights(
    profileId: string,
    weights: Readonly<Record<string, unknown>>,
  ): Promise<Profile | undefined>;
  /**
   * Copies the stored profile aside and resolves to the backup's location,
   * or `undefined` when there is nothing to back up.
   */
  backup(profileId: string): Promise<string | undefined>;
}

export interface ProfileStoreOptions extends ProfileMutationContext {
  readonly generateId?: () => string;
}

export const sortProfilesByName = (profiles: readonly Profile[]): Profile[] =>
  [...profiles].sort((left, right) => {
    const a = left.name.toLowerCase();
    const b = right.name.toLowerCase();
    return a < b ? -1 : a > b ? 1 : 0;
  });

const pad = (value: number): string => String(value).padStart(2, '0');

/** UTC `YYYYmmdd_HHMMSS`, used to name backups. */
export function formatBackupStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Implements the mutation workflow once; subclasses only move snapshots in
 * and out of their medium.
 */
export abstract class BaseProfileStore implements ProfileStore {
  protected readonly now: Clock;

  protected constructor(protected readonly options: ProfileStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  protected abstract read(profileId: string): Promise<Profile | undefined>;

  protected abstract readAll(): Promise<readonly Profile[]>;

  protected abstract write(profile: Profile): Promise<void>;

  protected abstract remove(profileId: string): Promise<boolean>;

  protected abstract copyAside(profileId: string, stamp: string): Promise<string | undefined>;

  async list(): Promise<readonly Profile[]> {
    return sortProfilesByName(await this.readAll());
  }

  get(profileId: string): Promise<Profile | undefined> {
    return this.read(profileId);
  }

  async create(name: string): Promise<Profile> {
    const profile = createProfile(name, {
      now: this.now,
      ...(this.options.generateId ? { id: this.options.generateId() } : {}),
    });
    await this.write(profile);
    return profile;
  }

  async save(profile: Profile): Promise<Profile> {
    const updated = freezeProfile({ ...profile, updatedAt: this.now().toISOString() });
    await this.write(updated);
    return updated;
  }

  delete(profileId: string): Promise<boolean> {
    return this.remove(profileId);
  }

  async duplicate(profileId: string, name: string): Promise<Profile | undefined> {
    const original = await this.read(profileId);
    if (original === undefined) {
      return undefined;
    }
    const copy = duplicateProfile(original, name, {
      now: this.now,
      ...(this.options.generateId ? { id: this.options.generateId() } : {}),
    });
    await this.write(copy);
    return copy;
  }

  updateLevel(
    profileId: string,
    upgradeId: string,
    level: number,
  ): Promise<Profile | undefined> {
    return this.mutate(profileId, (profile) =>
      setLevel(profile, upgradeId, level, this.mutationContext()),
    );
  }

  updateCurrency(profileId: string, amount: number): Promise<Profile | undefined> {
    return this.mutate(profileId, (profile) =>
      setCurrency(profile, amount, this.mutationContext()),
    );
  }

  updateWeights(
    profileId: string,
    weights: Readonly<Record<string, unknown>>,
  ): Promise<Profile | undefined> {
    return this.mutate(profileId, (profile) =>
      setWeights(profile, weights, this.mutationContext()),
    );
  }

  backup(profileId: string): Promise<string | undefined> {
    return this.copyAside(profileId, formatBackupStamp(this.now()));
  }

  private mutationContext(): ProfileMutationContext {
    return { ...this.options, now: this.now };
  }

  private async mutate(
    profileId: string,
    change: (profile: Profile) => Profile,
  ): Promise<Profile | undefined> {
    const profile = await this.read(profileId);
    if (profile === undefined) {
      return undefined;
    }
    const updated = change(profile);
    await this.write(updated);
    return updated;
  }
}

export class InMemoryProfileStore extends BaseProfileStore {
  private readonly profiles = new Map<string, Profile>();

  private readonly backups = new Map<string, Profile>();

  constructor(options: ProfileStoreOptions = {}) {
    super(options);
  }

  /** Backups taken so far, keyed by `<id>_<stamp>`. */
  getBackup(key: string): Profile | undefined {
    return this.backups.get(key);
  }

  protected async read(profileId: string): Promise<Profile | undefined> {
    return this.profiles.get(profileId);
  }

  protected async readAll(): Promise<readonly Profile[]> {
    return [...this.profiles.values()];
  }

  protected async write(profile: Profile): Promise<void> {
    this.profiles.set(profile.id, profile);
  }

  protected async remove(profileId: string): Promise<boolean> {
    return this.profiles.delete(profileId);
  }

  protected async copyAside(profileId: string, stamp: string): Promise<string | undefined> {
    const profile = this.profiles.get(profileId);
    if (profile === undefined) {
      return undefined;
    }
    const key = `${profileId}_${stamp}`;
    this.backups.set(key, profile);
    return key;
  }
}

export function createInMemoryProfileStore(
  options: ProfileStoreOptions = {},
): InMemoryProfileStore {
  return new InMemoryProfileStore(options);
}
