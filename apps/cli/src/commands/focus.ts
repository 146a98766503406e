/**
 * Focus Command
 * 
 * Report labels below a clip-count threshold and how many clips each
 * still needs.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { NotFoundError } from '@clipset/core';
import { labelProgress, scanDataset, summarizeCounts } from '@clipset/processing';
import { normalizeExtensions, VIDEO_EXTENSIONS } from '@clipset/utils';
import { loadConfig } from '../config/index.js';
import { EXIT_OK, EXIT_USAGE } from '../lib/exitCodes.js';
import { printError, printLines } from '../lib/output.js';
import type { CommandDeps } from './repair.js';

const count = (min: number) => z.string().transform(Number).pipe(z.number().int().min(min));

export const focusOptionsSchema = z.object({
  threshold: count(1).default('50'),
  margin: count(0).default('0'),
  top: count(0).default('0'),
  ext: z.array(z.string()).default([]),
});

export interface FocusOptions {
  threshold: number;
  margin: number;
  /** Only list the first N labels; 0 lists all */
  top: number;
}

export function renderFocusReport(
  root: string,
  counts: ReadonlyMap<string, number>,
  { threshold, margin, top }: FocusOptions
): string[] {
  const summary = summarizeCounts(counts);
  const progress = labelProgress(counts, threshold, margin);
  const under = progress.filter((row) => row.status === 'under');
  const over = progress.filter((row) => row.status === 'over');

  const lines = [
    `Dataset: ${root}`,
    `Classes: ${summary.classes}  Total clips: ${summary.total}  Mean/cls: ${summary.mean.toFixed(1)}` +
      `  Min: ${summary.min}  Max: ${summary.max}`,
    '',
  ];

  if (under.length === 0) {
    lines.push(`All labels meet the threshold (>= ${threshold - margin}).`);
  } else {
    lines.push(`Labels below threshold (< ${threshold - margin}), focus suggestions:`, '');

    const header = `${'label'.padEnd(30)}  ${'count'.padStart(6)}  ${'need'.padStart(6)}`;
    lines.push(header, '-'.repeat(header.length));
    for (const row of top > 0 ? under.slice(0, top) : under) {
      lines.push(`${row.label.padEnd(30)}  ${String(row.count).padStart(6)}  ${String(row.needed).padStart(6)}`);
    }

    const totalNeeded = under.reduce((sum, row) => sum + row.needed, 0);
    lines.push('', `Total clips needed to lift all under-threshold labels to ${threshold}: ${totalNeeded}`);
  }

  if (over.length > 0) {
    lines.push('', `Over target (> ${threshold + margin}): ${over.map((row) => row.label).join(', ')}`);
  }

  return lines;
}

export async function runFocus(
  rootArg: string | undefined,
  rawOptions: unknown,
  deps: CommandDeps = {}
): Promise<number> {
  const parsed = focusOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    printError(`Invalid options: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`);
    return EXIT_USAGE;
  }
  const options = parsed.data;
  const config = deps.config ?? loadConfig();
  const root = resolve(rootArg ?? config.trainingRoot);

  let counts: Map<string, number>;
  try {
    counts = await scanDataset(root, normalizeExtensions([...VIDEO_EXTENSIONS, ...options.ext]));
  } catch (error) {
    if (error instanceof NotFoundError) {
      printError(`Dataset path not found: ${root}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  printLines(renderFocusReport(root, counts, options));
  return EXIT_OK;
}

export async function focusCommand(root: string | undefined, options: unknown): Promise<void> {
  process.exitCode = await runFocus(root, options);
}
