/**
 * Application Context
 * 
 * Wires the stores and the transcoding pipeline once at startup.
 * Routes receive this instead of reaching for globals.
 */

import { join } from 'node:path';
import { LabelRegistry, SettingsStore, UndoStack, defaultSettings } from '@clipset/core';
import { FFProbe, createTargetProfile, type AudioPolicy } from '@clipset/media';
import { ClipExporter, TranscodeExecutor } from '@clipset/processing';
import { ensureDir, executeCommand, type CommandRunner, type Logger } from '@clipset/utils';
import { logger as apiLogger } from './logger.js';

export interface ContextOptions {
  dataDir: string;
  videosDir: string;
  datasetRoot: string;
  ffmpegPath: string;
  ffprobePath: string;
  frameRate?: number;
  audio?: AudioPolicy;
  hardwareEncoder?: string;
  alwaysReencode?: boolean;
  runner?: CommandRunner;
  now?: () => number;
  logger?: Logger;
}

export interface AppContext {
  settings: SettingsStore;
  labels: LabelRegistry;
  probe: FFProbe;
  executor: TranscodeExecutor;
  exporter: ClipExporter;
  logger: Logger;
}

export async function createContext(options: ContextOptions): Promise<AppContext> {
  const log = options.logger ?? apiLogger;
  const runner = options.runner ?? executeCommand;

  await ensureDir(options.dataDir);
  await ensureDir(options.videosDir);

  const settings = await SettingsStore.load(
    join(options.dataDir, 'settings.json'),
    defaultSettings(options.datasetRoot)
  );
  const labels = new LabelRegistry(join(options.dataDir, 'labels.txt'));
  const undo = new UndoStack(join(options.dataDir, 'undo.txt'));

  const probe = new FFProbe(options.ffprobePath, runner);
  const executor = new TranscodeExecutor({
    probe,
    ffmpegPath: options.ffmpegPath,
    runner,
    profile: createTargetProfile({
      frameRate: options.frameRate,
      audio: options.audio,
      hardwareEncoder: options.hardwareEncoder,
    }),
    diagnosticsFile: join(options.dataDir, 'transcode.log'),
    logger: log.child({ component: 'transcoder' }),
  });

  const exporter = new ClipExporter({
    videosDir: options.videosDir,
    settings,
    labels,
    undo,
    executor,
    alwaysReencode: options.alwaysReencode,
    now: options.now,
    logger: log.child({ component: 'exporter' }),
  });

  log.info(
    { dataDir: options.dataDir, videosDir: options.videosDir, datasetRoot: settings.get().datasetRoot },
    'Context ready'
  );

  return { settings, labels, probe, executor, exporter, logger: log };
}
