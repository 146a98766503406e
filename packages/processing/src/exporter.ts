/**
 * Clip Exporter
 * 
 * The interactive export workflow: resolve the source, plan the window
 * from the current settings, cut into Training/<label>/ and remember
 * the result for undo.
 */

import { readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import {
  SourceMissingError,
  ValidationError,
  trainingRoot,
  type LabelRegistry,
  type SettingsStore,
  type UndoStack,
} from '@clipset/core';
import {
  getBasename,
  isListableVideo,
  logger as rootLogger,
  pathExists,
  removeIfExists,
  sanitizeFilename,
  toMilliseconds,
  type Logger,
} from '@clipset/utils';
import { assertValidWindow, planClip } from './clipPlanner.js';
import type { TranscodeExecutor } from './transcoder.js';
import type { ClipWindow, Strategy } from './types.js';

export interface ExportRequest {
  videoFilename: string;
  currentTime: number;
  label: string;
  inMark?: number | null;
  outMark?: number | null;
}

export interface ExportResult {
  ok: true;
  path: string;
  label: string;
  window: ClipWindow;
  strategy: Strategy;
  normalized: boolean;
}

export interface UndoResult {
  ok: boolean;
  path: string | null;
}

export interface ClipExporterOptions {
  videosDir: string;
  settings: SettingsStore;
  labels: LabelRegistry;
  undo: UndoStack;
  executor: TranscodeExecutor;
  alwaysReencode?: boolean;
  /** Clock for the epoch suffix of clip names */
  now?: () => number;
  logger?: Logger;
}

export class ClipExporter {
  private readonly options: ClipExporterOptions;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: ClipExporterOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? rootLogger.child({ component: 'exporter' });
  }

  get videosDir(): string {
    return this.options.videosDir;
  }

  /**
   * Source videos available for export, sorted by name
   */
  async listVideos(): Promise<string[]> {
    let entries;
    try {
      entries = await readdir(this.options.videosDir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.isFile() && isListableVideo(entry.name))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
  }

  async exportClip(request: ExportRequest): Promise<ExportResult> {
    const { settings, labels, undo, executor } = this.options;
    if (!Number.isFinite(request.currentTime) || request.currentTime < 0) {
      throw new ValidationError('currentTime', 'must be a non-negative number of seconds');
    }

    // Only the base name counts, so a request can't reach outside videosDir
    const filename = basename(request.videoFilename);
    const source = join(this.options.videosDir, filename);
    if (!filename || !(await pathExists(source))) {
      throw new SourceMissingError(source);
    }

    const current = settings.get();
    const window = planClip({
      mode: current.clipMode,
      currentTime: request.currentTime,
      duration: current.clipDuration,
      inMark: request.inMark,
      outMark: request.outMark,
    });
    assertValidWindow(window);

    const label = sanitizeFilename(request.label.trim());
    await labels.append(label);

    const stem = sanitizeFilename(getBasename(filename));
    const name = `${stem}_${toMilliseconds(window.start)}_${toMilliseconds(window.end)}_${this.now()}.mp4`;
    const destination = join(trainingRoot(current), label, name);

    this.log.info({ source, label, window, destination }, 'Exporting clip');

    const outcome = await executor.cut(source, window, destination, {
      alwaysReencode: this.options.alwaysReencode,
    });
    if (!outcome.ok) {
      throw outcome.error;
    }

    await undo.push(outcome.path);

    return {
      ok: true,
      path: outcome.path,
      label,
      window,
      strategy: outcome.strategy,
      normalized: outcome.normalized,
    };
  }

  /**
   * Remove the most recent export. A clip already deleted by hand is
   * still popped.
   */
  async undoLast(): Promise<UndoResult> {
    const path = await this.options.undo.pop();
    if (path === null) {
      return { ok: false, path: null };
    }

    const removed = await removeIfExists(path);
    this.log.info({ path, removed }, 'Undid last export');
    return { ok: true, path };
  }
}
