/**
 * Serializes async tasks per key. Tasks on the same key run one at a time in
 * arrival order; tasks on different keys never wait for each other.
 *
 * Not reentrant: a task must not acquire its own key again.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: (() => void) | undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const queued = previous.then(() => current);
    this.tails.set(key, queued);

    await previous;
    try {
      return await task();
    } finally {
      release?.();
      if (this.tails.get(key) === queued) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether a task currently holds or waits for the key.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
