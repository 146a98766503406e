/**
 * FFmpeg Command Builder
 * 
 * Fluent API for the ffmpeg invocations clip export and repair need:
 * seek-bounded inputs, stream mapping, copy or encode, even-size scaling
 * and fast-start MP4 output.
 */

import { formatSeconds, logger } from '@clipset/utils';

export interface InputOptions {
  seekTo?: number;        // -ss before input (fast seek)
  duration?: number;      // -t duration
}

export interface OutputOptions {
  format?: string;        // -f format
  movflags?: string;      // -movflags for mp4
}

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'v:0', 'a:0'
  optional?: boolean;     // Add ? for optional
}

export interface VideoCodecOptions {
  codec: string;          // 'copy', 'libx264', 'h264_videotoolbox', ...
  preset?: string;
  crf?: number;
  bitrate?: string;
  pixFmt?: string;
  frameRate?: number;     // -r, constant output rate
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac';
  bitrate?: string;
}

/** Scale down to the nearest even width and height */
export const EVEN_DIMENSIONS_FILTER = 'scale=trunc(iw/2)*2:trunc(ih/2)*2';

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private noAudio: boolean = false;
  private videoFilters: string[] = [];
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Map the first video stream from input
   */
  mapFirstVideo(inputIndex: number = 0): this {
    return this.map(inputIndex, 'v:0');
  }

  /**
   * Map the first audio stream from input, if there is one
   */
  mapFirstAudio(inputIndex: number = 0): this {
    return this.map(inputIndex, 'a:0', true);
  }

  /**
   * Set video codec (copy = no re-encode)
   */
  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.videoCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set audio codec (copy = no re-encode)
   */
  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    this.noAudio = false;
    return this;
  }

  /**
   * Leave audio out of the output (-an)
   */
  dropAudio(): this {
    this.audioCodec = null;
    this.noAudio = true;
    return this;
  }

  /**
   * Add video filter
   */
  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  /**
   * Set output options
   */
  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [...this.globalArgs];

    for (const input of this.inputs) {
      if (input.options.seekTo !== undefined) {
        args.push('-ss', formatSeconds(input.options.seekTo));
      }
      if (input.options.duration !== undefined) {
        args.push('-t', formatSeconds(input.options.duration));
      }
      args.push('-i', input.file);
    }

    for (const mapping of this.mappings) {
      const opt = mapping.optional ? '?' : '';
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
    }

    // Video filters (only if not copying)
    if (this.videoFilters.length > 0) {
      if (this.videoCodec?.codec === 'copy') {
        logger.warn('Video filters specified but codec is copy - filters will be ignored');
      } else {
        args.push('-vf', this.videoFilters.join(','));
      }
    }

    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);

      if (this.videoCodec.codec !== 'copy') {
        if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
        if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
        if (this.videoCodec.bitrate) args.push('-b:v', this.videoCodec.bitrate);
        if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
        if (this.videoCodec.frameRate !== undefined) args.push('-r', this.videoCodec.frameRate.toString());
      }
    }

    if (this.noAudio) {
      args.push('-an');
    } else if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.codec !== 'copy' && this.audioCodec.bitrate) {
        args.push('-b:a', this.audioCodec.bitrate);
      }
    }

    if (this.outputOpts.format) {
      args.push('-f', this.outputOpts.format);
    }
    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

/**
 * Start a builder with the flags every clipset invocation shares:
 * no banner, no stdin, overwrite output
 */
export function baseCommand(): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder().addGlobalArg('-hide_banner', '-nostdin', '-y');
}

/**
 * Full decode pass with no output; exits non-zero on any decode error
 */
export function createDecodeCheckCommand(inputFile: string): string[] {
  return ['-hide_banner', '-nostdin', '-v', 'error', '-i', inputFile, '-f', 'null', '-'];
}
