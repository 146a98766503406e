/**
 * Media Types
 */

/**
 * What a file is reduced to for compatibility decisions.
 * Taken fresh for every decision; files get rewritten in place.
 */
export interface ProbeResult {
  filePath: string;
  hasVideo: boolean;
  videoCodec: string | null;
  pixelFormat: string | null;
  width: number;
  height: number;
  frameRate: number | null;
  hasAudio: boolean;
  audioCodec: string | null;
  duration: number | null;
}

export type AudioPolicy = 'aac' | 'drop';

/**
 * The single definition of a training-ready clip
 */
export interface TargetProfile {
  videoCodec: 'h264';
  pixelFormat: 'yuv420p';
  /** Constant output frame rate; undefined keeps the source timing */
  frameRate?: number;
  audio: AudioPolicy;
  audioBitrate: string;
  softwareEncoder: {
    codec: 'libx264';
    preset: string;
    crf: number;
  };
  hardwareEncoder: {
    codec: string;
    bitrate: string;
  };
}

export interface CompatibilityVerdict {
  videoOk: boolean;
  audioOk: boolean;
}

export const DEFAULT_TARGET_PROFILE: TargetProfile = {
  videoCodec: 'h264',
  pixelFormat: 'yuv420p',
  audio: 'aac',
  audioBitrate: '128k',
  softwareEncoder: {
    codec: 'libx264',
    preset: 'veryfast',
    crf: 20,
  },
  hardwareEncoder: {
    codec: 'h264_videotoolbox',
    bitrate: '2M',
  },
};

export function createTargetProfile(
  overrides: {
    frameRate?: number;
    audio?: AudioPolicy;
    hardwareEncoder?: string;
  } = {}
): TargetProfile {
  return {
    ...DEFAULT_TARGET_PROFILE,
    frameRate: overrides.frameRate && overrides.frameRate > 0 ? overrides.frameRate : undefined,
    audio: overrides.audio ?? DEFAULT_TARGET_PROFILE.audio,
    hardwareEncoder: {
      ...DEFAULT_TARGET_PROFILE.hardwareEncoder,
      codec: overrides.hardwareEncoder ?? DEFAULT_TARGET_PROFILE.hardwareEncoder.codec,
    },
  };
}
