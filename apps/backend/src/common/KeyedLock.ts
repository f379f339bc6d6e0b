/**
 * Keyed Lock
 * Serializes async work per key: at most one in-flight mutation per entity id
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run fn once every earlier holder of the same key has finished
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
