/**
 * Label Registry
 * 
 * Ordered, de-duplicated list of every label ever used, one per line
 * in first-seen order.
 */

import { resolve } from 'node:path';
import { mutexFor, safeReadFile, writeFileAtomic, type Mutex } from '@clipset/utils';

export class LabelRegistry {
  private readonly filePath: string;
  private readonly mutex: Mutex;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
    this.mutex = mutexFor(this.filePath);
  }

  async load(): Promise<string[]> {
    const content = await safeReadFile(this.filePath);
    if (content === null) return [];

    const labels = content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return [...new Set(labels)];
  }

  /**
   * Add a label if it is not registered yet.
   * Returns true when the registry changed.
   */
  async append(label: string): Promise<boolean> {
    const value = label.trim();
    if (!value) return false;

    return this.mutex.runExclusive(async () => {
      const labels = await this.load();
      if (labels.includes(value)) {
        return false;
      }
      labels.push(value);
      await writeFileAtomic(this.filePath, `${labels.join('\n')}\n`);
      return true;
    });
  }
}
