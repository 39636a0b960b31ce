/**
 * Per-key async mutex. Callers sharing a key run one at a time in arrival
 * order; different keys never wait on each other.
 */
export class KeyedLock<K> {
  private readonly chains = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = prev.then(() => next);
    this.chains.set(key, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      queueMicrotask(() => {
        if (this.chains.get(key) === chain) this.chains.delete(key);
      });
    }
  }
}
