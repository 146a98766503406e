/**
 * Clip Planner
 * 
 * Turns the clip mode, playhead and optional in/out marks into the
 * window to export.
 */

import { InvalidWindowError, type ClipMode } from '@clipset/core';
import type { ClipWindow } from './types.js';

export interface ClipPlanInput {
  mode: ClipMode;
  currentTime: number;
  duration: number;
  inMark?: number | null;
  outMark?: number | null;
}

function backwardWindow(currentTime: number, duration: number): ClipWindow {
  return { start: Math.max(0, currentTime - duration), end: currentTime };
}

/**
 * Never throws. Range mode with missing or inverted marks quietly plans
 * a backward window instead.
 */
export function planClip({ mode, currentTime, duration, inMark, outMark }: ClipPlanInput): ClipWindow {
  switch (mode) {
    case 'range':
      if (inMark != null && outMark != null && outMark > inMark) {
        return { start: Math.max(0, inMark), end: outMark };
      }
      return backwardWindow(currentTime, duration);
    case 'centered': {
      const start = Math.max(0, currentTime - duration / 2);
      return { start, end: start + duration };
    }
    case 'backward':
    default:
      return backwardWindow(currentTime, duration);
  }
}

/**
 * Reject empty, inverted or non-finite windows before anything is spawned
 */
export function assertValidWindow(window: ClipWindow): void {
  const { start, end } = window;
  if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || end - start <= 0) {
    throw new InvalidWindowError(start, end);
  }
}
