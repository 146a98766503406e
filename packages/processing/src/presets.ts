/**
 * Transcode Presets
 * 
 * Argument recipes for each rung of the fallback ladder. All of them
 * write fast-start MP4 and keep at most the first video and first
 * audio stream.
 */

import type { TargetProfile } from '@clipset/media';
import { baseCommand, EVEN_DIMENSIONS_FILTER, type InputOptions } from './commandBuilder.js';

/** What to do with the audio track of an encode */
export type AudioHandling = 'copy' | 'aac' | 'drop';

export interface EncodeInput {
  file: string;
  /** Bound the input to a window; omit to read it whole */
  range?: InputOptions;
}

export type EncoderKind = 'software' | 'hardware';

/**
 * Audio handling for a fresh encode under a profile
 */
export function targetAudio(profile: TargetProfile): AudioHandling {
  return profile.audio === 'drop' ? 'drop' : 'aac';
}

/**
 * Stream copy of a window, no re-encoding
 */
export function streamCopyArgs(
  input: EncodeInput,
  outputFile: string,
  profile: TargetProfile
): string[] {
  const builder = baseCommand()
    .addInput(input.file, input.range)
    .mapFirstVideo()
    .setVideoCodec('copy');

  if (profile.audio === 'drop') {
    builder.dropAudio();
  } else {
    builder.mapFirstAudio().setAudioCodec('copy');
  }

  return builder
    .setOutputOptions({ movflags: '+faststart' })
    .setOutput(outputFile)
    .build();
}

/**
 * Lossless remux of a whole file into fast-start layout
 */
export function remuxArgs(inputFile: string, outputFile: string): string[] {
  return baseCommand()
    .addInput(inputFile)
    .mapFirstVideo()
    .mapFirstAudio()
    .setVideoCodec('copy')
    .setAudioCodec('copy')
    .setOutputOptions({ movflags: '+faststart' })
    .setOutput(outputFile)
    .build();
}

/**
 * Full re-encode to the target profile with the software encoder or
 * its hardware substitute
 */
export function encodeArgs(
  kind: EncoderKind,
  input: EncodeInput,
  outputFile: string,
  profile: TargetProfile,
  audio: AudioHandling
): string[] {
  const builder = baseCommand()
    .addInput(input.file, input.range)
    .mapFirstVideo()
    .addVideoFilter(EVEN_DIMENSIONS_FILTER);

  if (kind === 'software') {
    builder.setVideoCodec({
      codec: profile.softwareEncoder.codec,
      preset: profile.softwareEncoder.preset,
      crf: profile.softwareEncoder.crf,
      pixFmt: profile.pixelFormat,
      frameRate: profile.frameRate,
    });
  } else {
    builder.setVideoCodec({
      codec: profile.hardwareEncoder.codec,
      bitrate: profile.hardwareEncoder.bitrate,
      pixFmt: profile.pixelFormat,
      frameRate: profile.frameRate,
    });
  }

  if (audio === 'drop') {
    builder.dropAudio();
  } else {
    builder.mapFirstAudio();
    builder.setAudioCodec(audio === 'copy' ? 'copy' : { codec: 'aac', bitrate: profile.audioBitrate });
  }

  return builder
    .setOutputOptions({ movflags: '+faststart' })
    .setOutput(outputFile)
    .build();
}
