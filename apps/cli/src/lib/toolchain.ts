/**
 * Toolchain
 * 
 * Builds the probe and transcoder the commands share.
 */

import { FFProbe, createTargetProfile, type AudioPolicy } from '@clipset/media';
import { TranscodeExecutor } from '@clipset/processing';
import { executeCommand, type CommandRunner } from '@clipset/utils';
import type { CliConfig } from '../config/index.js';

export interface ToolchainOptions {
  frameRate?: number;
  audio?: AudioPolicy;
  hardwareEncoder?: string;
}

export interface Toolchain {
  probe: FFProbe;
  executor: TranscodeExecutor;
}

export function createToolchain(
  config: CliConfig,
  options: ToolchainOptions = {},
  runner: CommandRunner = executeCommand
): Toolchain {
  const probe = new FFProbe(config.ffprobePath, runner);
  const executor = new TranscodeExecutor({
    probe,
    ffmpegPath: config.ffmpegPath,
    runner,
    profile: createTargetProfile({
      frameRate: options.frameRate,
      audio: options.audio ?? config.audio,
      hardwareEncoder: options.hardwareEncoder ?? config.hardwareEncoder,
    }),
  });
  return { probe, executor };
}
