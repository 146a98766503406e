/**
 * Dataset Scanning
 * 
 * Walks a label-bucketed Training root (one directory per label) and
 * reports how far each label is from its target clip count.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { NotFoundError } from '@clipset/core';
import { isListableVideo, VIDEO_EXTENSIONS } from '@clipset/utils';
import { isTempArtifact } from './transcoder.js';

export interface DatasetFile {
  label: string;
  path: string;
}

export interface DatasetSummary {
  classes: number;
  total: number;
  mean: number;
  min: number;
  max: number;
}

export type LabelStatus = 'under' | 'ok' | 'over';

export interface LabelProgress {
  label: string;
  count: number;
  /** Clips still missing to reach the target */
  needed: number;
  status: LabelStatus;
}

export interface DatasetStats {
  root: string;
  target: number;
  margin: number;
  summary: DatasetSummary;
  labels: LabelProgress[];
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readDirSorted(dir: string) {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.sort((a, b) => a.name.localeCompare(b.name));
}

async function readDirSortedOrFail(root: string) {
  try {
    return await readDirSorted(root);
  } catch (error) {
    if (isMissing(error)) {
      throw new NotFoundError('Dataset root', root);
    }
    throw error;
  }
}

/**
 * Every clip under root, label directories and files in name order.
 * Dotfiles, OS metadata, backups and temp outputs are skipped.
 */
export async function listDatasetFiles(
  root: string,
  extensions: readonly string[] = VIDEO_EXTENSIONS
): Promise<DatasetFile[]> {
  const files: DatasetFile[] = [];
  for (const dir of await readDirSortedOrFail(root)) {
    if (!dir.isDirectory()) continue;
    const labelPath = join(root, dir.name);
    for (const entry of await readDirSorted(labelPath)) {
      if (entry.isFile() && isListableVideo(entry.name, extensions) && !isTempArtifact(entry.name)) {
        files.push({ label: dir.name, path: join(labelPath, entry.name) });
      }
    }
  }
  return files;
}

/**
 * Clip count per label directory (empty directories count as 0)
 */
export async function scanDataset(
  root: string,
  extensions: readonly string[] = VIDEO_EXTENSIONS
): Promise<Map<string, number>> {
  const counts = new Map<string, number>();
  for (const entry of await readDirSortedOrFail(root)) {
    if (entry.isDirectory()) counts.set(entry.name, 0);
  }
  for (const file of await listDatasetFiles(root, extensions)) {
    counts.set(file.label, (counts.get(file.label) ?? 0) + 1);
  }
  return counts;
}

export function summarizeCounts(counts: ReadonlyMap<string, number>): DatasetSummary {
  const values = [...counts.values()];
  if (values.length === 0) {
    return { classes: 0, total: 0, mean: 0, min: 0, max: 0 };
  }
  const total = values.reduce((sum, n) => sum + n, 0);
  return {
    classes: values.length,
    total,
    mean: total / values.length,
    min: Math.min(...values),
    max: Math.max(...values),
  };
}

/**
 * Per-label distance to the target. A label is "under" below
 * target - margin and "over" above target + margin.
 * Sorted by count, then name.
 */
export function labelProgress(
  counts: ReadonlyMap<string, number>,
  target: number,
  margin: number
): LabelProgress[] {
  const rows: LabelProgress[] = [];
  for (const [label, count] of counts) {
    let status: LabelStatus = 'ok';
    if (count < target - margin) status = 'under';
    else if (count > target + margin) status = 'over';
    rows.push({ label, count, needed: Math.max(0, target - count), status });
  }
  return rows.sort((a, b) => a.count - b.count || a.label.localeCompare(b.label));
}

/**
 * Counts plus progress for a Training root. Registered labels without a
 * directory yet are reported with zero clips.
 */
export async function collectDatasetStats(options: {
  root: string;
  target: number;
  margin: number;
  knownLabels?: readonly string[];
  extensions?: readonly string[];
}): Promise<DatasetStats> {
  const counts = await scanDataset(options.root, options.extensions);
  for (const label of options.knownLabels ?? []) {
    if (!counts.has(label)) counts.set(label, 0);
  }

  return {
    root: options.root,
    target: options.target,
    margin: options.margin,
    summary: summarizeCounts(counts),
    labels: labelProgress(counts, options.target, options.margin),
  };
}
