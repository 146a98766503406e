import { describe, expect, it } from 'vitest';
import {
  assessProbe,
  chooseAction,
  evaluateCompatibility,
  isCompatible,
} from './compatibility.js';
import { createTargetProfile, DEFAULT_TARGET_PROFILE, type ProbeResult } from './types.js';

function probe(overrides: Partial<ProbeResult> = {}): ProbeResult {
  return {
    filePath: '/dataset/Training/dunk/a.mp4',
    hasVideo: true,
    videoCodec: 'h264',
    pixelFormat: 'yuv420p',
    width: 640,
    height: 480,
    frameRate: 30,
    hasAudio: false,
    audioCodec: null,
    duration: 4,
    ...overrides,
  };
}

describe('evaluateCompatibility', () => {
  it('accepts h264 yuv420p with even dimensions', () => {
    const verdict = evaluateCompatibility(probe(), DEFAULT_TARGET_PROFILE);

    expect(verdict).toEqual({ videoOk: true, audioOk: true });
    expect(isCompatible(verdict)).toBe(true);
    expect(chooseAction(verdict)).toBe('remux');
  });

  it('rejects odd width or height', () => {
    expect(evaluateCompatibility(probe({ width: 641 }), DEFAULT_TARGET_PROFILE).videoOk).toBe(false);
    expect(evaluateCompatibility(probe({ height: 479 }), DEFAULT_TARGET_PROFILE).videoOk).toBe(false);
  });

  it('rejects other codecs and pixel formats', () => {
    expect(evaluateCompatibility(probe({ videoCodec: 'hevc' }), DEFAULT_TARGET_PROFILE).videoOk).toBe(false);
    expect(evaluateCompatibility(probe({ pixelFormat: 'yuv444p' }), DEFAULT_TARGET_PROFILE).videoOk).toBe(false);
  });

  it('accepts an unset pixel format', () => {
    expect(evaluateCompatibility(probe({ pixelFormat: null }), DEFAULT_TARGET_PROFILE).videoOk).toBe(true);
  });

  it('never accepts a file without video', () => {
    const verdict = evaluateCompatibility(
      probe({ hasVideo: false, videoCodec: null, width: 0, height: 0 }),
      DEFAULT_TARGET_PROFILE
    );

    expect(verdict.videoOk).toBe(false);
    expect(chooseAction(verdict)).toBe('reencode');
  });

  it('requires AAC audio under the aac policy', () => {
    expect(evaluateCompatibility(probe({ hasAudio: true, audioCodec: 'aac' }), DEFAULT_TARGET_PROFILE).audioOk).toBe(true);
    expect(evaluateCompatibility(probe({ hasAudio: true, audioCodec: 'opus' }), DEFAULT_TARGET_PROFILE).audioOk).toBe(false);
  });

  it('treats any audio as out of profile under the drop policy', () => {
    const profile = createTargetProfile({ audio: 'drop' });

    expect(evaluateCompatibility(probe({ hasAudio: true, audioCodec: 'aac' }), profile).audioOk).toBe(false);
    expect(evaluateCompatibility(probe(), profile).audioOk).toBe(true);
  });

  it('ignores the frame rate', () => {
    const profile = createTargetProfile({ frameRate: 30 });

    expect(isCompatible(evaluateCompatibility(probe({ frameRate: 24 }), profile))).toBe(true);
  });
});

describe('assessProbe', () => {
  it('treats a missing probe as fully incompatible', () => {
    expect(assessProbe(null, DEFAULT_TARGET_PROFILE)).toEqual({ videoOk: false, audioOk: false });
  });
});

describe('createTargetProfile', () => {
  it('ignores non-positive frame rates and overrides the hardware encoder', () => {
    const profile = createTargetProfile({ frameRate: 0, hardwareEncoder: 'h264_vaapi' });

    expect(profile.frameRate).toBeUndefined();
    expect(profile.hardwareEncoder).toEqual({ codec: 'h264_vaapi', bitrate: '2M' });
  });
});
