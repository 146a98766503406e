/**
 * Undo Stack
 * 
 * Bounded LIFO of produced clip paths, persisted as one path per line
 * (most recent last). The file is re-read on every operation so a
 * restarted process sees exactly what the previous one left behind.
 */

import { resolve } from 'node:path';
import { mutexFor, safeReadFile, writeFileAtomic, type Mutex } from '@clipset/utils';

export const UNDO_CAPACITY = 10;

export class UndoStack {
  private readonly filePath: string;
  private readonly capacity: number;
  private readonly mutex: Mutex;

  constructor(filePath: string, capacity: number = UNDO_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Undo capacity must be a positive integer, got ${capacity}`);
    }
    this.filePath = resolve(filePath);
    this.capacity = capacity;
    this.mutex = mutexFor(this.filePath);
  }

  /**
   * Record a produced artifact. Entries beyond the capacity are
   * forgotten (oldest first); their files stay on disk.
   */
  async push(path: string): Promise<void> {
    const entry = path.trim();
    if (!entry) return;

    await this.mutex.runExclusive(async () => {
      const entries = await this.read();
      entries.push(entry);
      await this.write(entries.slice(-this.capacity));
    });
  }

  /**
   * Remove and return the most recent entry, or null when empty.
   * Deleting the file it names is up to the caller.
   */
  async pop(): Promise<string | null> {
    return this.mutex.runExclusive(async () => {
      const entries = await this.read();
      const last = entries.pop();
      if (last === undefined) {
        return null;
      }
      await this.write(entries);
      return last;
    });
  }

  /**
   * Current entries, oldest first
   */
  async list(): Promise<string[]> {
    return this.read();
  }

  private async read(): Promise<string[]> {
    const content = await safeReadFile(this.filePath);
    if (content === null) return [];
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  private async write(entries: string[]): Promise<void> {
    await writeFileAtomic(this.filePath, entries.length > 0 ? `${entries.join('\n')}\n` : '');
  }
}
