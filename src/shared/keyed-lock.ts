/**
 * Serializes async work per key. Work queued under the same key runs one task at a
 * time in arrival order; different keys never wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly holders = new Map<string, number>();

  isLocked(key: string): boolean {
    return (this.holders.get(key) ?? 0) > 0;
  }

  async run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);

    this.tails.set(key, tail);
    this.holders.set(key, (this.holders.get(key) ?? 0) + 1);

    try {
      await previous;
      return await task();
    } finally {
      release();
      const remaining = (this.holders.get(key) ?? 1) - 1;
      if (remaining === 0) {
        this.holders.delete(key);
      } else {
        this.holders.set(key, remaining);
      }

      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
