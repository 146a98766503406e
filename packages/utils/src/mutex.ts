/**
 * Async Mutex
 * 
 * Serializes async critical sections (read file, modify, write file)
 * within one process. Callers queue in arrival order.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

const sharedMutexes = new Map<string, Mutex>();

/**
 * One mutex per key for the whole process, so separate instances
 * guarding the same file still exclude each other
 */
export function mutexFor(key: string): Mutex {
  let mutex = sharedMutexes.get(key);
  if (!mutex) {
    mutex = new Mutex();
    sharedMutexes.set(key, mutex);
  }
  return mutex;
}
