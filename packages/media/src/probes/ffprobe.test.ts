import { describe, expect, it } from 'vitest';
import type { CommandResult, CommandRunner } from '@clipset/utils';
import { FFProbe, parseFrameRate } from './ffprobe.js';

function result(overrides: Partial<CommandResult>): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false, ...overrides };
}

const sampleOutput = JSON.stringify({
  streams: [
    { index: 0, codec_type: 'video', codec_name: 'H264', pix_fmt: 'yuv420p', width: 1280, height: 720, avg_frame_rate: '30000/1001' },
    { index: 1, codec_type: 'audio', codec_name: 'aac' },
  ],
  format: { filename: 'a.mp4', duration: '12.500000' },
});

describe('FFProbe', () => {
  it('passes the JSON stream/format arguments and reduces the output', async () => {
    const calls: Array<{ command: string; args: string[] }> = [];
    const runner: CommandRunner = async (command, args) => {
      calls.push({ command, args });
      return result({ stdout: sampleOutput });
    };

    const probe = await new FFProbe('/bin/ffprobe', runner).probe('/videos/a.mp4');

    expect(calls[0]).toEqual({
      command: '/bin/ffprobe',
      args: ['-v', 'error', '-print_format', 'json', '-show_streams', '-show_format', '/videos/a.mp4'],
    });
    expect(probe).toEqual({
      filePath: '/videos/a.mp4',
      hasVideo: true,
      videoCodec: 'h264',
      pixelFormat: 'yuv420p',
      width: 1280,
      height: 720,
      frameRate: 30000 / 1001,
      hasAudio: true,
      audioCodec: 'aac',
      duration: 12.5,
    });
  });

  it('returns null on a non-zero exit', async () => {
    const runner: CommandRunner = async () => result({ exitCode: 1, stderr: 'No such file' });

    await expect(new FFProbe('ffprobe', runner).probe('/missing.mp4')).resolves.toBeNull();
  });

  it('returns null on malformed output', async () => {
    const runner: CommandRunner = async () => result({ stdout: 'not json' });

    await expect(new FFProbe('ffprobe', runner).probe('/a.mp4')).resolves.toBeNull();
  });

  it('returns null when the tool cannot be spawned', async () => {
    const runner: CommandRunner = async () => {
      throw new Error('spawn ffprobe ENOENT');
    };

    await expect(new FFProbe('ffprobe', runner).probe('/a.mp4')).resolves.toBeNull();
  });

  it('throws from probeRaw so callers can show the reason', async () => {
    const runner: CommandRunner = async () => result({ exitCode: 1, stderr: 'Invalid data found' });

    await expect(new FFProbe('ffprobe', runner).probeRaw('/a.mp4')).rejects.toThrow('ffprobe failed (1): Invalid data found');
  });

  it('reports a file with no streams as having no video', async () => {
    const runner: CommandRunner = async () => result({ stdout: '{}' });

    const probe = await new FFProbe('ffprobe', runner).probe('/a.mp4');

    expect(probe?.hasVideo).toBe(false);
    expect(probe?.hasAudio).toBe(false);
  });
});

describe('parseFrameRate', () => {
  it('parses fractions and plain numbers', () => {
    expect(parseFrameRate('25/1')).toBe(25);
    expect(parseFrameRate('30')).toBe(30);
  });

  it('returns null for unknown rates', () => {
    expect(parseFrameRate('0/0')).toBeNull();
    expect(parseFrameRate(undefined)).toBeNull();
  });
});
