import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LabelRegistry } from './labels.js';

describe('LabelRegistry', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'clipset-labels-'));
    filePath = join(dir, 'labels.txt');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads an empty list when the file does not exist', async () => {
    await expect(new LabelRegistry(filePath).load()).resolves.toEqual([]);
  });

  it('appends labels in first-seen order without duplicates', async () => {
    const registry = new LabelRegistry(filePath);

    await expect(registry.append('dunk')).resolves.toBe(true);
    await expect(registry.append('layup')).resolves.toBe(true);
    await expect(registry.append('dunk')).resolves.toBe(false);

    await expect(registry.load()).resolves.toEqual(['dunk', 'layup']);
    await expect(readFile(filePath, 'utf8')).resolves.toBe('dunk\nlayup\n');
  });

  it('ignores blank lines and repeated entries already on disk', async () => {
    await writeFile(filePath, 'dunk\n\n  layup \ndunk\n', 'utf8');

    await expect(new LabelRegistry(filePath).load()).resolves.toEqual(['dunk', 'layup']);
  });
});
