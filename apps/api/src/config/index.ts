/**
 * API Configuration
 * 
 * All configuration loaded from environment variables.
 * Uses sensible defaults for a single-user workstation.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { resolveBinaries } from '@clipset/core';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

const flag = z.string().transform((v) => v === 'true' || v === '1');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('127.0.0.1'),
  API_PORT: z.string().transform(Number).pipe(z.number().int().min(0).max(65535)).default('8765'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Paths
  CLIPSET_HOME: z.string().default(join(homedir(), 'Clipset')),
  DATASET_ROOT: z.string().optional(),
  VIDEOS_DIR: z.string().optional(),

  // Binaries (resolved further by resolveBinaries)
  FFMPEG_PATH: z.string().optional(),
  FFPROBE_PATH: z.string().optional(),

  // Target profile
  CLIP_CFR: z.string().transform(Number).pipe(z.number().positive()).optional(),
  CLIP_AUDIO: z.enum(['aac', 'drop']).default('aac'),
  HW_ENCODER: z.string().default('h264_videotoolbox'),
  ALWAYS_REENCODE: flag.default('false'),
});

export type Env = z.infer<typeof envSchema>;

export function buildConfig(env: Env) {
  const home = resolve(env.CLIPSET_HOME);
  const binaries = resolveBinaries({
    env: { FFMPEG_PATH: env.FFMPEG_PATH, FFPROBE_PATH: env.FFPROBE_PATH },
    userBinDir: join(home, 'bin'),
  });

  return {
    nodeEnv: env.NODE_ENV,
    host: env.API_HOST,
    port: env.API_PORT,
    logLevel: env.LOG_LEVEL,

    // Paths
    home,
    dataDir: join(home, 'data'),
    videosDir: resolve(env.VIDEOS_DIR ?? join(home, 'videos')),
    datasetRoot: resolve(env.DATASET_ROOT ?? join(home, 'dataset')),

    // Binaries
    ffmpegPath: binaries.ffmpeg.resolvedPath,
    ffprobePath: binaries.ffprobe.resolvedPath,

    // Target profile
    frameRate: env.CLIP_CFR,
    audio: env.CLIP_AUDIO,
    hardwareEncoder: env.HW_ENCODER,
    alwaysReencode: env.ALWAYS_REENCODE,
  } as const;
}

export type Config = ReturnType<typeof buildConfig>;

/**
 * Parse and build the config from process.env; exits on invalid input
 */
export function loadConfig(): Config {
  const parseResult = envSchema.safeParse(process.env);

  if (!parseResult.success) {
    console.error('Invalid environment configuration:');
    console.error(parseResult.error.format());
    process.exit(1);
  }

  return buildConfig(parseResult.data);
}
