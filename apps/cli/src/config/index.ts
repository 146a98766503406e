/**
 * CLI Configuration
 * 
 * The CLI works on the local dataset directly; everything comes from
 * the environment.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { resolveBinaries, TRAINING_DIR } from '@clipset/core';

// Environment schema
export const envSchema = z.object({
  CLIPSET_HOME: z.string().default(join(homedir(), 'Clipset')),
  DATASET_ROOT: z.string().optional(),
  FFMPEG_PATH: z.string().optional(),
  FFPROBE_PATH: z.string().optional(),
  HW_ENCODER: z.string().default('h264_videotoolbox'),
  CLIP_AUDIO: z.enum(['aac', 'drop']).default('aac'),
  CLIPSET_DEBUG: z.string().optional(),
});

export type CliEnv = z.infer<typeof envSchema>;

export function buildConfig(env: CliEnv) {
  const home = resolve(env.CLIPSET_HOME);
  const datasetRoot = resolve(env.DATASET_ROOT ?? join(home, 'dataset'));
  const binaries = resolveBinaries({
    env: { FFMPEG_PATH: env.FFMPEG_PATH, FFPROBE_PATH: env.FFPROBE_PATH },
    userBinDir: join(home, 'bin'),
  });

  return {
    trainingRoot: join(datasetRoot, TRAINING_DIR),
    ffmpegPath: binaries.ffmpeg.resolvedPath,
    ffprobePath: binaries.ffprobe.resolvedPath,
    hardwareEncoder: env.HW_ENCODER,
    audio: env.CLIP_AUDIO,
    debug: env.CLIPSET_DEBUG === 'true',
  } as const;
}

export type CliConfig = ReturnType<typeof buildConfig>;

export function loadConfig(): CliConfig {
  return buildConfig(envSchema.parse(process.env));
}
