/**
 * FFProbe Wrapper
 * 
 * Runs ffprobe for JSON stream/format info and reduces it to the
 * fields compatibility decisions need.
 */

import { z } from 'zod';
import { executeCommand, logger, type CommandRunner } from '@clipset/utils';
import type { ProbeResult } from '../types.js';

const numeric = z.union([z.number(), z.string()]).optional();

const streamSchema = z.object({
  index: z.number().optional(),
  codec_name: z.string().optional(),
  codec_type: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  pix_fmt: z.string().optional(),
  r_frame_rate: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  duration: numeric,
}).passthrough();

const ffprobeOutputSchema = z.object({
  streams: z.array(streamSchema).default([]),
  format: z.object({
    filename: z.string().optional(),
    format_name: z.string().optional(),
    duration: numeric,
    size: numeric,
  }).passthrough().optional(),
});

export type FFProbeStream = z.infer<typeof streamSchema>;
export type FFProbeResult = z.infer<typeof ffprobeOutputSchema>;

/**
 * Parse "30000/1001" or "25" into frames per second
 */
export function parseFrameRate(value: string | undefined): number | null {
  if (!value) return null;
  const [num, den] = value.split('/');
  const numerator = Number(num);
  const denominator = den === undefined ? 1 : Number(den);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0 || numerator === 0) {
    return null;
  }
  return numerator / denominator;
}

function parseNumber(value: number | string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Reduce a validated ffprobe document to a ProbeResult.
 * Only the first video and first audio stream count.
 */
export function toProbeResult(filePath: string, raw: FFProbeResult): ProbeResult {
  const video = raw.streams.find((s) => s.codec_type === 'video');
  const audio = raw.streams.find((s) => s.codec_type === 'audio');

  return {
    filePath,
    hasVideo: video !== undefined,
    videoCodec: video?.codec_name?.toLowerCase() ?? null,
    pixelFormat: video?.pix_fmt?.toLowerCase() ?? null,
    width: video?.width ?? 0,
    height: video?.height ?? 0,
    frameRate: parseFrameRate(video?.avg_frame_rate) ?? parseFrameRate(video?.r_frame_rate),
    hasAudio: audio !== undefined,
    audioCodec: audio?.codec_name?.toLowerCase() ?? null,
    duration: parseNumber(raw.format?.duration),
  };
}

export class FFProbe {
  private readonly ffprobePath: string;
  private readonly runner: CommandRunner;

  constructor(ffprobePath: string = 'ffprobe', runner: CommandRunner = executeCommand) {
    this.ffprobePath = ffprobePath;
    this.runner = runner;
  }

  /**
   * Probe a media file and return the validated ffprobe document.
   * Throws when ffprobe cannot run, fails, or prints something else.
   */
  async probeRaw(filePath: string): Promise<FFProbeResult> {
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_streams',
      '-show_format',
      filePath,
    ];

    const result = await this.runner(this.ffprobePath, args, {
      timeout: 60000, // 1 minute timeout
    });

    if (result.exitCode !== 0) {
      throw new Error(`ffprobe failed (${result.exitCode}): ${result.stderr.trim()}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout || '{}');
    } catch {
      throw new Error(`Failed to parse ffprobe output: ${result.stdout.substring(0, 200)}`);
    }

    const parsed = ffprobeOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  /**
   * Probe a media file; null when ffprobe is unavailable, fails, or its
   * output cannot be read. Callers treat null as "must re-encode".
   */
  async probe(filePath: string): Promise<ProbeResult | null> {
    try {
      return toProbeResult(filePath, await this.probeRaw(filePath));
    } catch (error) {
      logger.warn({ err: error, filePath }, 'Probe unavailable, assuming incompatible');
      return null;
    }
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
