/**
 * Compatibility Policy
 * 
 * Decides whether a probed file already matches the target profile and,
 * if not, which part needs work. Export verification and dataset repair
 * both decide through this module.
 */

import type { CompatibilityVerdict, ProbeResult, TargetProfile } from './types.js';

export type NormalizationAction = 'remux' | 'reencode';

const isEven = (value: number): boolean => value > 0 && value % 2 === 0;

export function evaluateCompatibility(
  probe: ProbeResult,
  profile: TargetProfile
): CompatibilityVerdict {
  const videoOk =
    probe.hasVideo &&
    probe.videoCodec === profile.videoCodec &&
    (probe.pixelFormat === null || probe.pixelFormat === profile.pixelFormat) &&
    isEven(probe.width) &&
    isEven(probe.height);

  let audioOk: boolean;
  if (!probe.hasAudio) {
    audioOk = true;
  } else if (profile.audio === 'drop') {
    audioOk = false;
  } else {
    audioOk = probe.audioCodec === 'aac';
  }

  return { videoOk, audioOk };
}

/**
 * Verdict for a possibly failed probe; no probe means nothing is trusted
 */
export function assessProbe(
  probe: ProbeResult | null,
  profile: TargetProfile
): CompatibilityVerdict {
  if (probe === null) {
    return { videoOk: false, audioOk: false };
  }
  return evaluateCompatibility(probe, profile);
}

export function isCompatible(verdict: CompatibilityVerdict): boolean {
  return verdict.videoOk && verdict.audioOk;
}

export function chooseAction(verdict: CompatibilityVerdict): NormalizationAction {
  return isCompatible(verdict) ? 'remux' : 'reencode';
}
