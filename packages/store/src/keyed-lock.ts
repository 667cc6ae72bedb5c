/**
 * @aliaspay/store — Per-key async mutual exclusion.
 *
 * Work submitted under the same key runs strictly one after another;
 * work under different keys runs concurrently. Locks are released
 * whether the work resolves or rejects.
 */

export class KeyedLock {
  private readonly _tails = new Map<string, Promise<void>>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this._tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get pending(): number {
    return this._tails.size;
  }
}
