import { promises as fsPromises } from 'node:fs';
import path from 'node:path';

import {
  isNodeError,
  removeIfPresent,
  writeFileAtomic,
} from '@upgrade-advisor/catalog-schema';

import { telemetry, type TelemetryFacade } from '../telemetry.js';
import {
  ProfileMutationError,
  safeParseProfile,
  serializeProfile,
  type Profile,
} from './profile.js';
import { BaseProfileStore, type ProfileStoreOptions } from './profile-store.js';

const PROFILE_EXTENSION = '.json';
const BACKUP_DIRECTORY = 'backups';
const PROFILE_ID_PATTERN = /^[A-Za-z0-9][\w-]*$/;

export interface FileProfileStoreOptions extends ProfileStoreOptions {
  readonly telemetry?: TelemetryFacade;
}

type ReadOutcome =
  | { readonly kind: 'ok'; readonly profile: Profile }
  | { readonly kind: 'missing' }
  | { readonly kind: 'corrupt'; readonly reason: string };

/**
 * Stores each profile as `<directory>/<id>.json`. Writes go through a temp
 * file and rename. Unreadable files are reported through telemetry and
 * treated as absent.
 */
export class FileProfileStore extends BaseProfileStore {
  private readonly telemetry: TelemetryFacade;

  constructor(
    readonly directory: string,
    options: FileProfileStoreOptions = {},
  ) {
    super(options);
    this.telemetry = options.telemetry ?? telemetry;
  }

  protected async read(profileId: string): Promise<Profile | undefined> {
    if (!PROFILE_ID_PATTERN.test(profileId)) {
      return undefined;
    }
    const outcome = await this.readFile(this.pathFor(profileId));
    return outcome.kind === 'ok' ? outcome.profile : undefined;
  }

  protected async readAll(): Promise<readonly Profile[]> {
    let entries: string[];
    try {
      entries = await fsPromises.readdir(this.directory);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const profiles: Profile[] = [];
    for (const entry of entries.sort()) {
      if (entry.startsWith('.') || !entry.endsWith(PROFILE_EXTENSION)) {
        continue;
      }
      const outcome = await this.readFile(path.join(this.directory, entry));
      if (outcome.kind === 'ok') {
        profiles.push(outcome.profile);
      }
    }
    return profiles;
  }

  protected async write(profile: Profile): Promise<void> {
    await writeFileAtomic(this.pathFor(this.assertId(profile.id)), serializeProfile(profile));
  }

  protected remove(profileId: string): Promise<boolean> {
    if (!PROFILE_ID_PATTERN.test(profileId)) {
      return Promise.resolve(false);
    }
    return removeIfPresent(this.pathFor(profileId));
  }

  protected async copyAside(profileId: string, stamp: string): Promise<string | undefined> {
    if (!PROFILE_ID_PATTERN.test(profileId)) {
      return undefined;
    }
    const backupDirectory = path.join(this.directory, BACKUP_DIRECTORY);
    const backupPath = path.join(backupDirectory, `${profileId}_${stamp}${PROFILE_EXTENSION}`);
    await fsPromises.mkdir(backupDirectory, { recursive: true });
    try {
      await fsPromises.copyFile(this.pathFor(profileId), backupPath);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
    return backupPath;
  }

  private pathFor(profileId: string): string {
    return path.join(this.directory, `${profileId}${PROFILE_EXTENSION}`);
  }

  private assertId(profileId: string): string {
    if (!PROFILE_ID_PATTERN.test(profileId)) {
      throw new ProfileMutationError(`Invalid profile id: ${profileId}`);
    }
    return profileId;
  }

  private async readFile(filePath: string): Promise<ReadOutcome> {
    let text: string;
    try {
      text = await fsPromises.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return { kind: 'missing' };
      }
      throw error;
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
      return this.reportCorrupt(filePath, error.message);
    }

    const parsed = safeParseProfile(document);
    if (!parsed.success) {
      return this.reportCorrupt(filePath, parsed.error.issues[0]?.message ?? 'invalid profile');
    }
    return { kind: 'ok', profile: parsed.profile };
  }

  private reportCorrupt(filePath: string, reason: string): ReadOutcome {
    this.telemetry.recordWarning('profile.skipped', {
      file: path.basename(filePath),
      reason,
    });
    return { kind: 'corrupt', reason };
  }
}

export function createFileProfileStore(
  directory: string,
  options: FileProfileStoreOptions = {},
): FileProfileStore {
  return new FileProfileStore(directory, options);
}
