import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError } from '@clipset/core';
import { collectDatasetStats, labelProgress, scanDataset, summarizeCounts } from './dataset.js';

describe('labelProgress', () => {
  const counts = new Map([
    ['wave', 50],
    ['nod', 44],
    ['shrug', 45],
    ['clap', 56],
  ]);

  it('classifies each label against target and margin', () => {
    expect(labelProgress(counts, 50, 5)).toEqual([
      { label: 'nod', count: 44, needed: 6, status: 'under' },
      { label: 'shrug', count: 45, needed: 5, status: 'ok' },
      { label: 'wave', count: 50, needed: 0, status: 'ok' },
      { label: 'clap', count: 56, needed: 0, status: 'over' },
    ]);
  });

  it('breaks count ties by name', () => {
    expect(labelProgress(new Map([['b', 1], ['a', 1]]), 2, 0).map((row) => row.label)).toEqual(['a', 'b']);
  });
});

describe('summarizeCounts', () => {
  it('summarizes label counts', () => {
    expect(summarizeCounts(new Map([['a', 2], ['b', 6], ['c', 1]]))).toEqual({
      classes: 3,
      total: 9,
      mean: 3,
      min: 1,
      max: 6,
    });
  });

  it('is all zeros for an empty dataset', () => {
    expect(summarizeCounts(new Map())).toEqual({ classes: 0, total: 0, mean: 0, min: 0, max: 0 });
  });
});

describe('scanDataset', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'clipset-dataset-'));
    await mkdir(join(root, 'wave'));
    await mkdir(join(root, 'empty'));
    await writeFile(join(root, 'wave', 'a.mp4'), 'x');
    await writeFile(join(root, 'wave', 'b.MOV'), 'x');
    await writeFile(join(root, 'wave', '._a.mp4'), 'x');
    await writeFile(join(root, 'wave', 'a.mp4.bak'), 'x');
    await writeFile(join(root, 'wave', 'c.mp4.part.tmp.mp4'), 'x');
    await writeFile(join(root, 'stray.mp4'), 'x');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('counts listable clips per label directory', async () => {
    const counts = await scanDataset(root);

    expect(Object.fromEntries(counts)).toEqual({ empty: 0, wave: 2 });
  });

  it('reports registered labels that have no directory yet', async () => {
    const stats = await collectDatasetStats({ root, target: 2, margin: 0, knownLabels: ['wave', 'jump'] });

    expect(stats.summary).toEqual({ classes: 3, total: 2, mean: 2 / 3, min: 0, max: 2 });
    expect(stats.labels).toEqual([
      { label: 'empty', count: 0, needed: 2, status: 'under' },
      { label: 'jump', count: 0, needed: 2, status: 'under' },
      { label: 'wave', count: 2, needed: 0, status: 'ok' },
    ]);
  });

  it('rejects a missing root', async () => {
    await expect(scanDataset(join(root, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
  });
});
