const settle = (): void => undefined;

/**
 * Serializes async work per key. Work queued under one key runs strictly in order;
 * different keys never wait on each other. Not reentrant.
 */
export class KeyedMutex<K = string> {
  private tails = new Map<K, Promise<void>>();

  async run<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(settle, settle);
    this.tails.set(key, tail);
    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
