/**
 * Per-key async mutex built from promise chains. Work queued under the same
 * key runs strictly one at a time in arrival order; different keys never wait
 * on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, work: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await work();
    } finally {
      release();
      // Last holder for this key cleans up so the map does not grow unbounded
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Hold several keys at once. Keys are taken in sorted order so two callers
   * locking overlapping sets cannot deadlock.
   */
  runExclusiveMany<T>(keys: Iterable<string>, work: () => Promise<T> | T): Promise<T> {
    const sorted = [...new Set(keys)].sort();
    const acquire = (index: number): Promise<T> => {
      const key = sorted[index];
      if (key === undefined) {
        return Promise.resolve().then(work);
      }
      return this.runExclusive(key, () => acquire(index + 1));
    };
    return acquire(0);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
