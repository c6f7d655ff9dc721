/**
 * KeyedLock — per-key async mutual exclusion.
 *
 * Callers holding different keys never wait on each other. Callers on
 * the same key run one at a time, in arrival order. A task that throws
 * releases the key like one that returns.
 */
export class KeyedLock<K> {
  private readonly _tails = new Map<K, Promise<void>>();

  async run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this._tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /** Whether any task holds or waits on the key. */
  isLocked(key: K): boolean {
    return this._tails.has(key);
  }

  /** Number of keys with a holder or waiter. */
  get size(): number {
    return this._tails.size;
  }
}
