/**
 * Fallback Ladder
 * 
 * Runs an ordered list of strategies until one produces a non-empty
 * output file. Every attempt is recorded, failed or not.
 */

import type { AttemptDiagnostics } from '@clipset/core';
import { getFileSizeBytes, removeIfExists, type Logger } from '@clipset/utils';
import type { Strategy } from './types.js';

export interface LadderRung {
  strategy: Strategy;
  /** ffmpeg arguments writing to the given output */
  args: string[];
}

export interface AttemptResult {
  ok: boolean;
  diagnostics: AttemptDiagnostics;
}

export type AttemptRunner = (strategy: string, args: string[]) => Promise<AttemptResult>;

export type LadderResult =
  | { ok: true; strategy: Strategy; attempts: AttemptDiagnostics[] }
  | { ok: false; attempts: AttemptDiagnostics[] };

export async function runLadder(
  rungs: LadderRung[],
  outputFile: string,
  runAttempt: AttemptRunner,
  log: Logger
): Promise<LadderResult> {
  const attempts: AttemptDiagnostics[] = [];

  for (const rung of rungs) {
    const { ok, diagnostics } = await runAttempt(rung.strategy, rung.args);

    if (ok) {
      const size = await getFileSizeBytes(outputFile);
      if (size !== null && size > 0) {
        attempts.push(diagnostics);
        return { ok: true, strategy: rung.strategy, attempts };
      }
      diagnostics.stderr = `${diagnostics.stderr}\nffmpeg exited 0 but produced no output`.trim();
    }

    attempts.push(diagnostics);
    log.warn(
      { strategy: rung.strategy, exitCode: diagnostics.exitCode, command: diagnostics.command },
      'Transcode attempt failed'
    );
    // Never leave a partial file for the next rung or the caller
    await removeIfExists(outputFile);
  }

  return { ok: false, attempts };
}
