import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { SettingsStore, defaultSettings } from './settings.js';

describe('SettingsStore', () => {
  let dir: string;
  let mirror: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'clipset-settings-'));
    mirror = join(dir, 'settings.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts from defaults and creates the Training directory', async () => {
    const root = join(dir, 'dataset');
    const store = await SettingsStore.load(mirror, defaultSettings(root));

    expect(store.get()).toEqual({
      datasetRoot: root,
      clipDuration: 2,
      clipMode: 'backward',
      targetPerLabel: 50,
      marginPerLabel: 5,
    });
    expect((await stat(join(root, 'Training'))).isDirectory()).toBe(true);
  });

  it('merges valid fields from the mirror over defaults', async () => {
    await writeFile(mirror, JSON.stringify({ clipDuration: 3.5, clipMode: 'centered' }), 'utf8');

    const store = await SettingsStore.load(mirror, defaultSettings(join(dir, 'dataset')));

    expect(store.get().clipDuration).toBe(3.5);
    expect(store.get().clipMode).toBe('centered');
  });

  it('falls back to defaults when the mirror is corrupt', async () => {
    await writeFile(mirror, '{not json', 'utf8');

    const store = await SettingsStore.load(mirror, defaultSettings(join(dir, 'dataset')));

    expect(store.get().clipDuration).toBe(2);
  });

  it('validates, applies and persists partial updates', async () => {
    const store = await SettingsStore.load(mirror, defaultSettings(join(dir, 'dataset')));

    const updated = await store.update({ clipMode: 'range', targetPerLabel: 80 });

    expect(updated.clipMode).toBe('range');
    expect(updated.targetPerLabel).toBe(80);
    const persisted: unknown = JSON.parse(await readFile(mirror, 'utf8'));
    expect(persisted).toMatchObject({ clipMode: 'range', targetPerLabel: 80 });
  });

  it('rejects invalid updates and keeps the previous settings', async () => {
    const store = await SettingsStore.load(mirror, defaultSettings(join(dir, 'dataset')));

    await expect(store.update({ clipMode: 'sideways' })).rejects.toBeInstanceOf(ZodError);
    await expect(store.update({ clipDuration: 0 })).rejects.toBeInstanceOf(ZodError);
    expect(store.get().clipMode).toBe('backward');
  });

  it('creates the Training directory of a new dataset root', async () => {
    const store = await SettingsStore.load(mirror, defaultSettings(join(dir, 'dataset')));
    const newRoot = join(dir, 'other');

    await store.update({ datasetRoot: newRoot });

    expect((await stat(join(newRoot, 'Training'))).isDirectory()).toBe(true);
  });
});
