/**
 * @clipset/media
 * 
 * Media inspection layer.
 * 
 * Responsibilities:
 * - Probe files with ffprobe
 * - Define the target profile of a training clip
 * - Decide compatibility against that profile
 */

// Probing
export {
  FFProbe,
  parseFrameRate,
  toProbeResult,
  type FFProbeResult,
  type FFProbeStream,
} from './probes/ffprobe.js';

// Compatibility
export {
  evaluateCompatibility,
  assessProbe,
  isCompatible,
  chooseAction,
  type NormalizationAction,
} from './compatibility.js';

// Types
export {
  DEFAULT_TARGET_PROFILE,
  createTargetProfile,
  type ProbeResult,
  type TargetProfile,
  type AudioPolicy,
  type CompatibilityVerdict,
} from './types.js';
