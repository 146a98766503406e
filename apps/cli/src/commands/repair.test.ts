import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  FAKE_FFMPEG,
  FAKE_FFPROBE,
  FakeToolchain,
  H264_AAC,
  readFakeMedia,
  writeFakeMedia,
} from '@clipset/processing/testing';
import type { CliConfig } from '../config/index.js';
import { EXIT_FAILURES, EXIT_OK, EXIT_USAGE } from '../lib/exitCodes.js';
import { runProbe } from './probe.js';
import { runRepair } from './repair.js';

describe('CLI media commands', () => {
  let dir: string;
  let root: string;
  let output: string[];
  let errors: string[];
  let config: CliConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'clipset-cli-'));
    root = join(dir, 'Training');
    await mkdir(join(root, 'wave'), { recursive: true });
    await writeFakeMedia(join(root, 'wave', 'a.mp4'), H264_AAC);
    await writeFakeMedia(join(root, 'wave', 'b.mp4'), { ...H264_AAC, videoCodec: 'hevc', frameRate: 24 });

    config = {
      trainingRoot: root,
      ffmpegPath: FAKE_FFMPEG,
      ffprobePath: FAKE_FFPROBE,
      hardwareEncoder: 'h264_videotoolbox',
      audio: 'aac',
      debug: false,
    };
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.join(' '));
    });
    errors = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(String(args.at(-1)));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('repair', () => {
    it('repairs the default root and prints one line per file', async () => {
      const toolchain = new FakeToolchain();

      const code = await runRepair(undefined, { cfr: '30' }, { config, runner: toolchain.runner });

      expect(code).toBe(EXIT_OK);
      expect(output).toEqual([
        `[OK] Repaired ${join(root, 'wave', 'a.mp4')} (remux)`,
        `[OK] Repaired ${join(root, 'wave', 'b.mp4')} (re-encode, software)`,
        '',
        'Done. processed=2 repaired=2 failed=0 (remux=1 re-encode=1)',
      ]);
      expect(await readFakeMedia(join(root, 'wave', 'b.mp4'))).toMatchObject({ videoCodec: 'h264', frameRate: 30 });
    });

    it('only prints the plan on a dry run', async () => {
      const toolchain = new FakeToolchain();

      const code = await runRepair(root, { dryRun: true }, { config, runner: toolchain.runner });

      expect(code).toBe(EXIT_OK);
      expect(output.slice(0, 2)).toEqual([
        `[DRY] Would remux: ${join(root, 'wave', 'a.mp4')}`,
        `[DRY] Would re-encode: ${join(root, 'wave', 'b.mp4')}`,
      ]);
      expect(toolchain.transcodes).toEqual([]);
    });

    it('falls back to the default extensions when the list is empty', async () => {
      const toolchain = new FakeToolchain();

      const code = await runRepair(root, { dryRun: true, exts: ' , ' }, { config, runner: toolchain.runner });

      expect(code).toBe(EXIT_OK);
      expect(output.slice(0, 2)).toEqual([
        `[DRY] Would remux: ${join(root, 'wave', 'a.mp4')}`,
        `[DRY] Would re-encode: ${join(root, 'wave', 'b.mp4')}`,
      ]);
    });

    it('exits with 1 when a file fails', async () => {
      const toolchain = new FakeToolchain({ failEncoders: ['libx264', 'h264_videotoolbox'] });

      const code = await runRepair(root, {}, { config, runner: toolchain.runner });

      expect(code).toBe(EXIT_FAILURES);
      expect(output.some((line) => line.includes(`[ERR] Failed to repair ${join(root, 'wave', 'b.mp4')}`))).toBe(true);
      expect(output).toContain('Done. processed=2 repaired=1 failed=1 (remux=1 re-encode=0)');
    });

    it('exits with 2 when the root is missing', async () => {
      const toolchain = new FakeToolchain();

      await expect(runRepair(join(dir, 'missing'), {}, { config, runner: toolchain.runner })).resolves.toBe(EXIT_USAGE);
    });

    it('rejects a bad frame rate before touching anything', async () => {
      const toolchain = new FakeToolchain();

      await expect(runRepair(root, { cfr: 'fast' }, { config, runner: toolchain.runner })).resolves.toBe(EXIT_USAGE);
      expect(toolchain.calls).toEqual([]);
    });
  });

  describe('probe', () => {
    it('prints the repair plan as JSON', async () => {
      const toolchain = new FakeToolchain();
      const file = join(root, 'wave', 'b.mp4');

      const code = await runProbe(file, { json: true }, { config, runner: toolchain.runner });

      expect(code).toBe(EXIT_OK);
      expect(JSON.parse(output.join('\n'))).toMatchObject({
        path: file,
        action: 'reencode',
        verdict: { videoOk: false, audioOk: true },
        probe: { videoCodec: 'hevc', frameRate: 24 },
      });
    });

    it('exits with 1 for a file that cannot be probed', async () => {
      const file = join(dir, 'notes.mp4');
      await writeFile(file, 'plain text');

      await expect(runProbe(file, {}, { config, runner: new FakeToolchain().runner })).resolves.toBe(EXIT_FAILURES);
      expect(errors).toEqual([
        `Could not probe ${file}: ffprobe failed (1): ${file}: Invalid data found when processing input`,
      ]);
    });
  });
});
