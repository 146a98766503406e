/**
 * Probe Command
 * 
 * Show what ffprobe reports for a file and what repair would do with it.
 */

import { resolve } from 'node:path';
import chalk from 'chalk';
import type { FFProbe } from '@clipset/media';
import { loadConfig } from '../config/index.js';
import { EXIT_FAILURES, EXIT_OK } from '../lib/exitCodes.js';
import { printError, printHeader, printJson, printKeyValue } from '../lib/output.js';
import { createToolchain } from '../lib/toolchain.js';
import type { CommandDeps } from './repair.js';

export interface ProbeCommandOptions {
  json?: boolean;
}

export async function runProbe(
  file: string,
  options: ProbeCommandOptions = {},
  deps: CommandDeps = {}
): Promise<number> {
  const config = deps.config ?? loadConfig();
  const { probe: ffprobe, executor } = createToolchain(config, {}, deps.runner);
  const path = resolve(file);

  const plan = await executor.planNormalization(path);
  if (options.json) {
    printJson(plan);
    return plan.probe ? EXIT_OK : EXIT_FAILURES;
  }

  if (!plan.probe) {
    printError(`Could not probe ${path}: ${await probeFailure(ffprobe, path)}`);
    return EXIT_FAILURES;
  }

  const { probe, verdict } = plan;
  printHeader(path);
  printKeyValue('Video', probe.hasVideo
    ? `${probe.videoCodec ?? 'unknown'} ${probe.pixelFormat ?? ''} ${probe.width}x${probe.height}`.replace(/\s+/g, ' ')
    : 'none');
  printKeyValue('Frame rate', probe.frameRate !== null ? probe.frameRate.toFixed(3) : 'unknown');
  printKeyValue('Audio', probe.hasAudio ? probe.audioCodec ?? 'unknown' : 'none');
  printKeyValue('Duration', probe.duration !== null ? `${probe.duration.toFixed(3)}s` : 'unknown');
  printKeyValue('Video in profile', verdict.videoOk ? chalk.green('yes') : chalk.red('no'));
  printKeyValue('Audio in profile', verdict.audioOk ? chalk.green('yes') : chalk.red('no'));
  printKeyValue('Repair action', plan.action);

  return EXIT_OK;
}

async function probeFailure(ffprobe: FFProbe, path: string): Promise<string> {
  try {
    await ffprobe.probeRaw(path);
    return 'no usable streams';
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

export async function probeCommand(file: string, options: ProbeCommandOptions): Promise<void> {
  process.exitCode = await runProbe(file, options);
}
