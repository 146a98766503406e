/**
 * Dataset Repair
 * 
 * Batch pass over a label-bucketed dataset that rewrites every clip into
 * the target profile. Files already in profile are only remuxed, so a
 * second pass re-encodes nothing.
 */

import { EventEmitter } from 'node:events';
import { VIDEO_EXTENSIONS, logger as rootLogger, type Logger } from '@clipset/utils';
import type { NormalizationAction } from '@clipset/media';
import { listDatasetFiles } from './dataset.js';
import { DEFAULT_BACKUP_SUFFIX, type TranscodeExecutor } from './transcoder.js';
import type { Strategy } from './types.js';

export type RepairItemStatus = 'repaired' | 'planned' | 'failed';

export interface RepairItem {
  path: string;
  label: string;
  status: RepairItemStatus;
  action: NormalizationAction | null;
  strategy: Strategy | null;
  backupPath: string | null;
  error: string | null;
}

export interface RepairOptions {
  root: string;
  extensions?: readonly string[];
  dryRun?: boolean;
  backupSuffix?: string;
}

export interface RepairReport {
  root: string;
  dryRun: boolean;
  processed: number;
  repaired: number;
  failed: number;
  remuxed: number;
  reencoded: number;
  items: RepairItem[];
}

export interface RepairEvents {
  file: [item: RepairItem, index: number, total: number];
}

export class DatasetRepair extends EventEmitter<RepairEvents> {
  private readonly executor: TranscodeExecutor;
  private readonly log: Logger;

  constructor(executor: TranscodeExecutor, logger?: Logger) {
    super();
    this.executor = executor;
    this.log = logger ?? rootLogger.child({ component: 'repair' });
  }

  /**
   * Walk root and normalize each clip, one at a time. A failed file is
   * recorded and the batch moves on. Throws NotFoundError when root is
   * missing.
   */
  async run(options: RepairOptions): Promise<RepairReport> {
    const dryRun = options.dryRun ?? false;
    const backupSuffix = options.backupSuffix ?? DEFAULT_BACKUP_SUFFIX;
    const files = await listDatasetFiles(options.root, options.extensions ?? VIDEO_EXTENSIONS);

    const report: RepairReport = {
      root: options.root,
      dryRun,
      processed: 0,
      repaired: 0,
      failed: 0,
      remuxed: 0,
      reencoded: 0,
      items: [],
    };

    this.log.info({ root: options.root, files: files.length, dryRun }, 'Starting dataset repair');

    for (const [index, file] of files.entries()) {
      let item: RepairItem;

      if (dryRun) {
        const plan = await this.executor.planNormalization(file.path);
        item = {
          path: file.path,
          label: file.label,
          status: 'planned',
          action: plan.action,
          strategy: null,
          backupPath: null,
          error: null,
        };
      } else {
        const outcome = await this.executor.normalizeInPlace(file.path, { backupSuffix });
        item = outcome.ok
          ? {
              path: file.path,
              label: file.label,
              status: 'repaired',
              action: outcome.action,
              strategy: outcome.strategy,
              backupPath: outcome.backupPath,
              error: null,
            }
          : {
              path: file.path,
              label: file.label,
              status: 'failed',
              action: null,
              strategy: null,
              backupPath: null,
              error: outcome.error.message,
            };
      }

      report.processed++;
      if (item.status === 'repaired') report.repaired++;
      if (item.status === 'failed') report.failed++;
      if (item.action === 'remux') report.remuxed++;
      if (item.action === 'reencode') report.reencoded++;
      report.items.push(item);

      this.emit('file', item, index, files.length);
    }

    this.log.info(
      { processed: report.processed, repaired: report.repaired, failed: report.failed },
      'Dataset repair finished'
    );
    return report;
  }
}
