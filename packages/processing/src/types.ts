/**
 * Processing Types
 */

import type {
  AttemptDiagnostics,
  ReplaceFailedError,
  TranscodeFailedError,
  VerificationFailedError,
} from '@clipset/core';
import type { CompatibilityVerdict, NormalizationAction, ProbeResult } from '@clipset/media';

/** Which rung of the ladder produced a file */
export type Strategy = 'copy' | 'software' | 'hardware' | 'remux';

export interface ClipWindow {
  start: number;  // seconds, >= 0
  end: number;    // seconds, > start
}

export type TranscodeError = TranscodeFailedError | VerificationFailedError | ReplaceFailedError;

export interface TranscodeFailure {
  ok: false;
  error: TranscodeError;
  attempts: AttemptDiagnostics[];
}

export interface CutSuccess {
  ok: true;
  path: string;
  strategy: Strategy;
  /** The copy output was out of profile and got re-encoded */
  normalized: boolean;
  attempts: AttemptDiagnostics[];
}

export type CutOutcome = CutSuccess | TranscodeFailure;

export interface NormalizeSuccess {
  ok: true;
  path: string;
  action: NormalizationAction;
  strategy: Strategy;
  backupPath: string | null;
  attempts: AttemptDiagnostics[];
}

export type NormalizeOutcome = NormalizeSuccess | TranscodeFailure;

export interface NormalizationPlan {
  path: string;
  action: NormalizationAction;
  verdict: CompatibilityVerdict;
  probe: ProbeResult | null;
}
