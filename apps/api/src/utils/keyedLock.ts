/**
 * Serializes async work per key. A call for a busy key waits until every
 * earlier call for that key has settled; other keys run independently.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<unknown>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}
