/**
 * Per-key mutual exclusion.
 *
 * Resolutions of unrelated artifacts run in parallel; two resolutions that
 * would write the same artifact path run one after the other.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with a running or queued task
   */
  get size(): number {
    return this.tails.size;
  }
}
