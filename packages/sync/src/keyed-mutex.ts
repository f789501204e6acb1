/**
 * Per-key mutual exclusion. Work for the same key runs strictly in call
 * order; work for different keys runs concurrently.
 *
 * @example
 * ```typescript
 * const locks = new KeyedMutex();
 * await locks.run('task:task-1', async () => {
 *   // read-modify-write for task-1 only
 * });
 * ```
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `work` once every earlier task for `key` has settled
   */
  async run<T>(key: string, work: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether any task holds or waits on `key`
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys with held or pending work
   */
  get size(): number {
    return this.tails.size;
  }
}
