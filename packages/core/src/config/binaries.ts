/**
 * Binary Configuration
 * 
 * Locates the ffmpeg and ffprobe executables.
 * 
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. User-local binary folder (~/Clipset/bin/)
 * 3. Common Homebrew locations
 * 4. System PATH
 */

import { accessSync, constants, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { basename, dirname, join } from 'node:path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: 'env' | 'user' | 'system' | 'path';
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  userBinDir?: string;
  systemDirs?: string[];
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

function isExecutable(filePath: string): boolean {
  try {
    if (!statSync(filePath).isFile()) return false;
    accessSync(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function defaultUserBinDir(): string {
  return join(homedir(), 'Clipset', 'bin');
}

/**
 * Resolve one binary by name
 */
export function resolveBinary(
  name: string,
  envVar: string,
  options: ResolveOptions = {}
): BinaryConfig {
  const env = options.env ?? process.env;
  const exeName = name + getExeExt();

  const envPath = env[envVar];
  if (envPath) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const userPath = join(options.userBinDir ?? defaultUserBinDir(), exeName);
  if (isExecutable(userPath)) {
    return { name, envVar, resolvedPath: userPath, source: 'user' };
  }

  for (const dir of options.systemDirs ?? ['/opt/homebrew/bin', '/usr/local/bin']) {
    const candidate = join(dir, exeName);
    if (isExecutable(candidate)) {
      return { name, envVar, resolvedPath: candidate, source: 'system' };
    }
  }

  // Let the system PATH resolve it; fails at spawn time if missing
  return { name, envVar, resolvedPath: exeName, source: 'path' };
}

/**
 * Resolve ffmpeg, then ffprobe. Without an explicit FFPROBE_PATH the
 * ffprobe next to the chosen ffmpeg wins, so both come from one build.
 */
export function resolveBinaries(options: ResolveOptions = {}): BinariesConfig {
  const env = options.env ?? process.env;
  const ffmpeg = resolveBinary('ffmpeg', 'FFMPEG_PATH', options);

  let ffprobe: BinaryConfig;
  if (env['FFPROBE_PATH']) {
    ffprobe = resolveBinary('ffprobe', 'FFPROBE_PATH', options);
  } else if (ffmpeg.source !== 'path' && basename(ffmpeg.resolvedPath).startsWith('ffmpeg')) {
    const sibling = join(
      dirname(ffmpeg.resolvedPath),
      basename(ffmpeg.resolvedPath).replace(/^ffmpeg/, 'ffprobe')
    );
    ffprobe = { name: 'ffprobe', envVar: 'FFPROBE_PATH', resolvedPath: sibling, source: ffmpeg.source };
  } else {
    ffprobe = resolveBinary('ffprobe', 'FFPROBE_PATH', options);
  }

  return { ffmpeg, ffprobe };
}
