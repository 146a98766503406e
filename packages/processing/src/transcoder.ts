/**
 * Transcode Executor
 *
 * Cuts clips and normalizes existing files through the fallback ladder
 * (stream copy → software encode → hardware encode). Output always goes
 * to a temp file beside the target and is renamed into place, so a crash
 * mid-encode never leaves a truncated artifact under a final name.
 */

import { rename } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  ReplaceFailedError,
  TranscodeFailedError,
  VerificationFailedError,
  type AttemptDiagnostics,
} from '@clipset/core';
import {
  assessProbe,
  chooseAction,
  DEFAULT_TARGET_PROFILE,
  isCompatible,
  type FFProbe,
  type TargetProfile,
} from '@clipset/media';
import {
  appendText,
  ensureDir,
  executeCommand,
  formatCommand,
  logger as rootLogger,
  moveFile,
  pathExists,
  removeIfExists,
  type CommandRunner,
  type Logger,
} from '@clipset/utils';
import { createDecodeCheckCommand } from './commandBuilder.js';
import { runLadder, type AttemptResult, type LadderRung } from './ladder.js';
import {
  encodeArgs,
  remuxArgs,
  streamCopyArgs,
  targetAudio,
  type AudioHandling,
  type EncodeInput,
} from './presets.js';
import type {
  ClipWindow,
  CutOutcome,
  NormalizationPlan,
  NormalizeOutcome,
  TranscodeFailure,
} from './types.js';

export const DEFAULT_BACKUP_SUFFIX = '.bak';

const TEMP_SUFFIX = '.tmp.mp4';

/**
 * Temp path beside a target; the .mp4 ending lets ffmpeg pick the muxer
 */
export function tempPathFor(target: string, tag: string): string {
  return `${target}.${tag}${TEMP_SUFFIX}`;
}

export function isTempArtifact(filename: string): boolean {
  return filename.toLowerCase().endsWith(TEMP_SUFFIX);
}

export interface TranscodeExecutorOptions {
  probe: FFProbe;
  ffmpegPath?: string;
  profile?: TargetProfile;
  runner?: CommandRunner;
  /** Failed ladders are appended here; null disables the file */
  diagnosticsFile?: string | null;
  logger?: Logger;
}

export interface CutOptions {
  /** Skip the stream-copy rung */
  alwaysReencode?: boolean;
}

export interface NormalizeOptions {
  /** Appended to the original's name for the backup; empty deletes the original */
  backupSuffix?: string;
}

export class TranscodeExecutor {
  private readonly ffmpegPath: string;
  private readonly probe: FFProbe;
  private readonly runner: CommandRunner;
  private readonly diagnosticsFile: string | null;
  private readonly log: Logger;
  readonly profile: TargetProfile;

  constructor(options: TranscodeExecutorOptions) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.probe = options.probe;
    this.profile = options.profile ?? DEFAULT_TARGET_PROFILE;
    this.runner = options.runner ?? executeCommand;
    this.diagnosticsFile = options.diagnosticsFile ?? null;
    this.log = options.logger ?? rootLogger.child({ component: 'transcoder' });
  }

  /**
   * Cut [window.start, window.end) of source into destination.
   *
   * When the stream-copy rung wins, the result is probed and re-encoded
   * in place if it is out of profile. Encoded rungs are not re-probed.
   */
  async cut(
    source: string,
    window: ClipWindow,
    destination: string,
    options: CutOptions = {}
  ): Promise<CutOutcome> {
    await ensureDir(dirname(destination));

    const partPath = tempPathFor(destination, 'part');
    const input: EncodeInput = {
      file: source,
      range: { seekTo: window.start, duration: window.end - window.start },
    };

    const rungs: LadderRung[] = [];
    if (!options.alwaysReencode) {
      rungs.push({ strategy: 'copy', args: streamCopyArgs(input, partPath, this.profile) });
    }
    rungs.push(...this.encodeRungs(input, partPath, targetAudio(this.profile)));

    const cut = await runLadder(rungs, partPath, this.runAttempt, this.log);
    if (!cut.ok) {
      return this.fail(new TranscodeFailedError(destination, cut.attempts), cut.attempts, [partPath]);
    }

    const attempts = [...cut.attempts];
    let normalized = false;

    if (cut.strategy === 'copy') {
      const verdict = assessProbe(await this.probe.probe(partPath), this.profile);

      if (!isCompatible(verdict)) {
        this.log.info({ destination, verdict }, 'Stream copy is out of profile, re-encoding');

        const normPath = tempPathFor(destination, 'norm');
        const audio: AudioHandling = verdict.audioOk && this.profile.audio === 'aac' ? 'copy' : targetAudio(this.profile);
        const renorm = await runLadder(
          this.encodeRungs({ file: partPath }, normPath, audio),
          normPath,
          this.runAttempt,
          this.log
        );
        attempts.push(...renorm.attempts);

        if (!renorm.ok) {
          return this.fail(
            new VerificationFailedError(destination, 'stream copy is out of profile and re-encoding it failed', attempts),
            attempts,
            [partPath, normPath]
          );
        }

        try {
          await rename(normPath, partPath);
        } catch (error) {
          return this.fail(
            new ReplaceFailedError(partPath, errorMessage(error)),
            attempts,
            [partPath, normPath]
          );
        }
        normalized = true;
      }
    }

    try {
      await moveFile(partPath, destination);
    } catch (error) {
      return this.fail(new ReplaceFailedError(destination, errorMessage(error)), attempts, [partPath]);
    }

    this.log.info({ destination, strategy: cut.strategy, normalized }, 'Clip written');
    return { ok: true, path: destination, strategy: cut.strategy, normalized, attempts };
  }

  /**
   * Decide what normalizeInPlace would do, without writing anything
   */
  async planNormalization(path: string): Promise<NormalizationPlan> {
    const probe = await this.probe.probe(path);
    const verdict = assessProbe(probe, this.profile);
    return { path, action: chooseAction(verdict), verdict, probe };
  }

  /**
   * Rewrite a file so it matches the profile: remux when it already
   * does, re-encode otherwise. The result must decode cleanly before it
   * replaces the original.
   */
  async normalizeInPlace(path: string, options: NormalizeOptions = {}): Promise<NormalizeOutcome> {
    const backupSuffix = options.backupSuffix ?? DEFAULT_BACKUP_SUFFIX;
    const plan = await this.planNormalization(path);
    const tmpPath = `${path}${TEMP_SUFFIX}`;

    const rungs: LadderRung[] = plan.action === 'remux'
      ? [{ strategy: 'remux', args: remuxArgs(path, tmpPath) }]
      : this.encodeRungs(
          { file: path },
          tmpPath,
          plan.verdict.audioOk && this.profile.audio === 'aac' ? 'copy' : targetAudio(this.profile)
        );

    const ladder = await runLadder(rungs, tmpPath, this.runAttempt, this.log);
    if (!ladder.ok) {
      return this.fail(new TranscodeFailedError(path, ladder.attempts), ladder.attempts, [tmpPath]);
    }

    const attempts = [...ladder.attempts];
    const check = await this.runAttempt('decode-check', createDecodeCheckCommand(tmpPath));
    if (!check.ok) {
      attempts.push(check.diagnostics);
      return this.fail(
        new VerificationFailedError(path, 'decode check failed', attempts),
        attempts,
        [tmpPath]
      );
    }

    let backupPath: string | null;
    try {
      backupPath = await replaceWithBackup(path, tmpPath, backupSuffix);
    } catch (error) {
      // Once the original has left its name the rewrite is the only copy there
      const leftovers = (await pathExists(path)) ? [tmpPath] : [];
      return this.fail(new ReplaceFailedError(path, errorMessage(error)), attempts, leftovers);
    }

    this.log.info({ path, action: plan.action, strategy: ladder.strategy, backupPath }, 'File normalized');
    return { ok: true, path, action: plan.action, strategy: ladder.strategy, backupPath, attempts };
  }

  /**
   * Check if ffmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner(this.ffmpegPath, ['-version'], { timeout: 5000 });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  private encodeRungs(input: EncodeInput, outputFile: string, audio: AudioHandling): LadderRung[] {
    return [
      { strategy: 'software', args: encodeArgs('software', input, outputFile, this.profile, audio) },
      { strategy: 'hardware', args: encodeArgs('hardware', input, outputFile, this.profile, audio) },
    ];
  }

  private runAttempt = async (strategy: string, args: string[]): Promise<AttemptResult> => {
    const command = formatCommand(this.ffmpegPath, args);
    this.log.debug({ strategy, command }, 'Running ffmpeg');

    try {
      const result = await this.runner(this.ffmpegPath, args);
      return {
        ok: result.exitCode === 0,
        diagnostics: { strategy, command, exitCode: result.exitCode, stderr: result.stderr },
      };
    } catch (error) {
      return {
        ok: false,
        diagnostics: { strategy, command, exitCode: null, stderr: errorMessage(error) },
      };
    }
  };

  private async fail(
    error: TranscodeFailure['error'],
    attempts: AttemptDiagnostics[],
    leftovers: string[]
  ): Promise<TranscodeFailure> {
    for (const file of leftovers) {
      await removeIfExists(file);
    }

    this.log.error({ err: error, attempts }, error.message);
    if (this.diagnosticsFile) {
      await appendText(this.diagnosticsFile, formatDiagnostics(error.message, attempts));
    }

    return { ok: false, error, attempts };
  }
}

/**
 * Swap a rewritten file in for the original, keeping the original as
 * <path><suffix> when a suffix is given. Returns the backup path.
 */
export async function replaceWithBackup(
  original: string,
  replacement: string,
  backupSuffix: string
): Promise<string | null> {
  if (!backupSuffix) {
    await rename(replacement, original);
    return null;
  }

  const backupPath = `${original}${backupSuffix}`;
  await removeIfExists(backupPath);
  await rename(original, backupPath);
  try {
    await rename(replacement, original);
  } catch (error) {
    // Put the original back so the name never points at nothing
    if (!(await pathExists(original))) {
      await rename(backupPath, original);
    }
    throw error;
  }
  return backupPath;
}

export function formatDiagnostics(title: string, attempts: AttemptDiagnostics[]): string {
  const lines = [`[${new Date().toISOString()}] ${title}`];
  for (const attempt of attempts) {
    lines.push(`  [${attempt.strategy}] exit=${attempt.exitCode ?? 'spawn-error'} ${attempt.command}`);
    for (const line of attempt.stderr.trim().split('\n')) {
      if (line) lines.push(`    ${line}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
