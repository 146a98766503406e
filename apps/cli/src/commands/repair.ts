/**
 * Repair Command
 * 
 * Normalize every clip of a Training directory in place.
 */

import { resolve } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import { z } from 'zod';
import { NotFoundError } from '@clipset/core';
import { DatasetRepair, type RepairItem, type RepairReport } from '@clipset/processing';
import { formatDuration, normalizeExtensions, VIDEO_EXTENSIONS, type CommandRunner } from '@clipset/utils';
import { loadConfig, type CliConfig } from '../config/index.js';
import { EXIT_FAILURES, EXIT_OK, EXIT_USAGE } from '../lib/exitCodes.js';
import { printError, printLines } from '../lib/output.js';
import { createToolchain } from '../lib/toolchain.js';

export const repairOptionsSchema = z.object({
  exts: z.string().default('.m4v,.mov,.mp4'),
  cfr: z.string().transform(Number).pipe(z.number().int().min(0)).default('30'),
  audio: z.enum(['aac', 'drop']).optional(),
  hwEncoder: z.string().min(1).optional(),
  dryRun: z.boolean().default(false),
  backupExt: z.string().default('.bak'),
});

export interface CommandDeps {
  config?: CliConfig;
  runner?: CommandRunner;
}

export function formatRepairItem(item: RepairItem): string {
  switch (item.status) {
    case 'planned':
      return `[DRY] Would ${item.action === 'remux' ? 'remux' : 're-encode'}: ${item.path}`;
    case 'repaired':
      return `[OK] Repaired ${item.path} (${item.action === 'remux' ? 'remux' : `re-encode, ${item.strategy ?? 'unknown'}`})`;
    case 'failed':
      return `[ERR] Failed to repair ${item.path}: ${item.error ?? 'unknown error'}`;
  }
}

export function formatRepairSummary(report: RepairReport): string {
  return `Done. processed=${report.processed} repaired=${report.repaired} failed=${report.failed}` +
    ` (remux=${report.remuxed} re-encode=${report.reencoded})`;
}

/** An empty list means the default set */
export function repairExtensions(exts: string): string[] {
  const extensions = normalizeExtensions(exts.split(','));
  return extensions.length > 0 ? extensions : [...VIDEO_EXTENSIONS];
}

export async function runRepair(
  rootArg: string | undefined,
  rawOptions: unknown,
  deps: CommandDeps = {}
): Promise<number> {
  const parsed = repairOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    printError(`Invalid options: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`);
    return EXIT_USAGE;
  }
  const options = parsed.data;
  const config = deps.config ?? loadConfig();
  const root = resolve(rootArg ?? config.trainingRoot);

  const { executor } = createToolchain(
    config,
    {
      frameRate: options.cfr > 0 ? options.cfr : undefined,
      audio: options.audio,
      hardwareEncoder: options.hwEncoder,
    },
    deps.runner
  );

  if (!options.dryRun && !(await executor.isAvailable())) {
    printError(`ffmpeg not found at ${config.ffmpegPath}. Set FFMPEG_PATH or install ffmpeg.`);
    return EXIT_FAILURES;
  }

  const repair = new DatasetRepair(executor);
  const startedAt = Date.now();
  const spinner = ora(`Scanning ${root}`).start();

  repair.on('file', (item, index, total) => {
    spinner.clear();
    const line = formatRepairItem(item);
    console.log(item.status === 'failed' ? chalk.red(line) : line);
    spinner.text = `Repairing ${index + 1}/${total}`;
    spinner.render();
  });

  let report: RepairReport;
  try {
    report = await repair.run({
      root,
      extensions: repairExtensions(options.exts),
      dryRun: options.dryRun,
      backupSuffix: options.backupExt,
    });
  } catch (error) {
    if (error instanceof NotFoundError) {
      spinner.stop();
      printError(`Root not found or not a directory: ${root}`);
      return EXIT_USAGE;
    }
    spinner.stop();
    throw error;
  }

  spinner.succeed(`Finished ${root} in ${formatDuration(Date.now() - startedAt)}`);
  printLines(['', formatRepairSummary(report)]);
  return report.failed > 0 ? EXIT_FAILURES : EXIT_OK;
}

export async function repairCommand(root: string | undefined, options: unknown): Promise<void> {
  process.exitCode = await runRepair(root, options);
}
