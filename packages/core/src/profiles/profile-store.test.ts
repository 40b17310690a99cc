import { describe, expect, it } from 'vitest';

import { fixedClock, loadTestCatalog } from '../__fixtures__/fixtures.js';
import {
  createInMemoryProfileStore,
  formatBackupStamp,
  sortProfilesByName,
} from './profile-store.js';
import { createProfile, ProfileMutationError } from './profile.js';

const sequentialIds = () => {
  let next = 0;
  return () => {
    next += 1;
    return `profile-${next}`;
  };
};

const createStore = () =>
  createInMemoryProfileStore({
    now: fixedClock,
    generateId: sequentialIds(),
    catalog: loadTestCatalog(),
  });

describe('formatBackupStamp', () => {
  it('formats UTC date and time', () => {
    expect(formatBackupStamp(new Date('2024-03-07T04:05:09.500Z'))).toBe('20240307_040509');
  });
});

describe('sortProfilesByName', () => {
  it('ignores case', () => {
    const names = ['beta', 'Alpha', 'gamma'].map((name) => createProfile(name));

    expect(sortProfilesByName(names).map((profile) => profile.name)).toEqual([
      'Alpha',
      'beta',
      'gamma',
    ]);
  });
});

describe('InMemoryProfileStore', () => {
  it('creates and lists profiles by name', async () => {
    const store = createStore();

    await store.create('Zeta');
    await store.create('alpha');

    const listed = await store.list();
    expect(listed.map((profile) => [profile.id, profile.name])).toEqual([
      ['profile-2', 'alpha'],
      ['profile-1', 'Zeta'],
    ]);
  });

  it('applies level updates with catalog clamping', async () => {
    const store = createStore();
    const profile = await store.create('Main');

    const updated = await store.updateLevel(profile.id, 'damage', 9);

    expect(updated?.levels).toEqual({ damage: 5 });
    expect(updated?.revision).toBe(2);
    expect((await store.get(profile.id))?.levels).toEqual({ damage: 5 });
  });

  it('rejects unknown upgrade ids', async () => {
    const store = createStore();
    const profile = await store.create('Main');

    await expect(store.updateLevel(profile.id, 'teleport', 1)).rejects.toThrow(
      ProfileMutationError,
    );
  });

  it('resolves to undefined for missing profiles', async () => {
    const store = createStore();

    await expect(store.updateCurrency('missing', 10)).resolves.toBeUndefined();
    await expect(store.updateWeights('missing', { attack: 1 })).resolves.toBeUndefined();
    await expect(store.duplicate('missing', 'Copy')).resolves.toBeUndefined();
    await expect(store.backup('missing')).resolves.toBeUndefined();
    await expect(store.delete('missing')).resolves.toBe(false);
  });

  it('updates currency and weights', async () => {
    const store = createStore();
    const profile = await store.create('Main');

    await store.updateCurrency(profile.id, -3);
    const updated = await store.updateWeights(profile.id, { attack: 1.5, utility: 9 });

    expect(updated?.availableCurrency).toBe(0);
    expect(updated?.weights).toEqual({ attack: 1.5, utility: 2 });
    expect(updated?.revision).toBe(3);
  });

  it('duplicates under a new id', async () => {
    const store = createStore();
    const original = await store.create('Main');
    await store.updateLevel(original.id, 'health', 2);

    const copy = await store.duplicate(original.id, 'Main (copy)');

    expect(copy?.id).toBe('profile-2');
    expect(copy?.levels).toEqual({ health: 2 });
    expect(copy?.revision).toBe(1);
    expect(await store.list()).toHaveLength(2);
  });

  it('backs up the stored snapshot', async () => {
    const store = createStore();
    const profile = await store.create('Main');

    const key = await store.backup(profile.id);

    expect(key).toBe('profile-1_20240601_120000');
    expect(store.getBackup('profile-1_20240601_120000')).toEqual(profile);
  });

  it('deletes profiles', async () => {
    const store = createStore();
    const profile = await store.create('Main');

    await expect(store.delete(profile.id)).resolves.toBe(true);
    await expect(store.get(profile.id)).resolves.toBeUndefined();
  });
});
