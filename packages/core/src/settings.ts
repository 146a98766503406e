/**
 * Export Settings
 * 
 * Single owner of the process-wide export settings. Loaded once from
 * the JSON mirror (falling back to defaults), changed only through
 * update(), which validates, serializes writers and persists the mirror.
 */

import { join, resolve } from 'node:path';
import { z } from 'zod';
import { ensureDir, logger, Mutex, mutexFor, safeReadFile, writeFileAtomic } from '@clipset/utils';

/** Clips live under <datasetRoot>/Training/<label>/ */
export const TRAINING_DIR = 'Training';

export const clipModeSchema = z.enum(['backward', 'centered', 'range']);

export type ClipMode = z.infer<typeof clipModeSchema>;

export const exportSettingsSchema = z.object({
  datasetRoot: z.string().min(1),
  clipDuration: z.number().positive().finite(),
  clipMode: clipModeSchema,
  targetPerLabel: z.number().int().min(1),
  marginPerLabel: z.number().int().min(0),
});

export type ExportSettings = z.infer<typeof exportSettingsSchema>;

export const settingsUpdateSchema = exportSettingsSchema.partial().strict();

export type SettingsUpdate = z.infer<typeof settingsUpdateSchema>;

export function defaultSettings(datasetRoot: string): ExportSettings {
  return {
    datasetRoot,
    clipDuration: 2.0,
    clipMode: 'backward',
    targetPerLabel: 50,
    marginPerLabel: 5,
  };
}

export function trainingRoot(settings: Pick<ExportSettings, 'datasetRoot'>): string {
  return join(settings.datasetRoot, TRAINING_DIR);
}

export class SettingsStore {
  private current: ExportSettings;
  private readonly filePath: string | null;
  private readonly mutex: Mutex;

  /**
   * @param filePath - JSON mirror location, or null to keep settings in memory only
   */
  constructor(initial: ExportSettings, filePath: string | null = null) {
    this.current = exportSettingsSchema.parse(initial);
    this.filePath = filePath ? resolve(filePath) : null;
    this.mutex = this.filePath ? mutexFor(this.filePath) : new Mutex();
  }

  /**
   * Build a store from the on-disk mirror. Missing fields come from
   * defaults; an unreadable or invalid mirror is ignored with a warning.
   */
  static async load(filePath: string, defaults: ExportSettings): Promise<SettingsStore> {
    const content = await safeReadFile(filePath);
    let merged: ExportSettings = { ...defaults };

    if (content !== null) {
      let raw: unknown;
      try {
        raw = JSON.parse(content);
      } catch (error) {
        logger.warn({ err: error, filePath }, 'Settings mirror is not valid JSON, using defaults');
        raw = {};
      }

      const fields = exportSettingsSchema.partial().safeParse(raw);
      if (fields.success) {
        merged = { ...merged, ...fields.data };
      } else {
        logger.warn({ filePath, issues: fields.error.issues }, 'Settings mirror is invalid, using defaults');
      }
    }

    const store = new SettingsStore(merged, filePath);
    await ensureDir(trainingRoot(merged));
    return store;
  }

  get(): Readonly<ExportSettings> {
    return { ...this.current };
  }

  /**
   * Apply a partial update. Throws a ZodError for invalid input.
   */
  async update(patch: unknown): Promise<ExportSettings> {
    const changes = settingsUpdateSchema.parse(patch);

    return this.mutex.runExclusive(async () => {
      const next: ExportSettings = { ...this.current, ...changes };
      if (changes.datasetRoot !== undefined) {
        await ensureDir(trainingRoot(next));
      }
      if (this.filePath) {
        await writeFileAtomic(this.filePath, `${JSON.stringify(next, null, 2)}\n`);
      }
      this.current = next;
      logger.info({ changes }, 'Export settings updated');
      return { ...next };
    });
  }
}
