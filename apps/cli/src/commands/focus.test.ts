import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CliConfig } from '../config/index.js';
import { EXIT_OK, EXIT_USAGE } from '../lib/exitCodes.js';
import { renderFocusReport, runFocus } from './focus.js';

describe('renderFocusReport', () => {
  const counts = new Map([
    ['wave', 50],
    ['nod', 44],
    ['clap', 56],
    ['jump', 0],
  ]);

  it('lists labels below the threshold with what they still need', () => {
    expect(renderFocusReport('/data/Training', counts, { threshold: 50, margin: 5, top: 0 })).toEqual([
      'Dataset: /data/Training',
      'Classes: 4  Total clips: 150  Mean/cls: 37.5  Min: 0  Max: 56',
      '',
      'Labels below threshold (< 45), focus suggestions:',
      '',
      `${'label'.padEnd(30)}   count    need`,
      '-'.repeat(46),
      `${'jump'.padEnd(30)}       0      50`,
      `${'nod'.padEnd(30)}      44       6`,
      '',
      'Total clips needed to lift all under-threshold labels to 50: 56',
      '',
      'Over target (> 55): clap',
    ]);
  });

  it('limits the list to the top labels but totals all of them', () => {
    const lines = renderFocusReport('/data/Training', counts, { threshold: 50, margin: 5, top: 1 });

    expect(lines.filter((line) => line.startsWith('nod'))).toEqual([]);
    expect(lines).toContain('Total clips needed to lift all under-threshold labels to 50: 56');
  });

  it('says so when every label meets the threshold', () => {
    expect(renderFocusReport('/d', new Map([['a', 50]]), { threshold: 50, margin: 0, top: 0 })).toEqual([
      'Dataset: /d',
      'Classes: 1  Total clips: 50  Mean/cls: 50.0  Min: 50  Max: 50',
      '',
      'All labels meet the threshold (>= 50).',
    ]);
  });
});

describe('runFocus', () => {
  let root: string;
  let output: string[];

  const config = (trainingRoot: string): CliConfig => ({
    trainingRoot,
    ffmpegPath: 'ffmpeg',
    ffprobePath: 'ffprobe',
    hardwareEncoder: 'h264_videotoolbox',
    audio: 'aac',
    debug: false,
  });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'clipset-focus-'));
    await mkdir(join(root, 'wave'));
    await writeFile(join(root, 'wave', 'a.mp4'), '');
    await writeFile(join(root, 'wave', 'b.avi'), '');
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('counts extra extensions when asked', async () => {
    const code = await runFocus(undefined, { threshold: '3', ext: ['avi'] }, { config: config(root) });

    expect(code).toBe(EXIT_OK);
    expect(output).toContain(`${'wave'.padEnd(30)}       2       1`);
  });

  it('exits with 2 for a missing root', async () => {
    const code = await runFocus(join(root, 'missing'), {}, { config: config(root) });

    expect(code).toBe(EXIT_USAGE);
    expect(output).toEqual([]);
  });

  it('rejects a non-numeric threshold', async () => {
    await expect(runFocus(undefined, { threshold: 'many' }, { config: config(root) })).resolves.toBe(EXIT_USAGE);
  });
});
