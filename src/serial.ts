/**
 * Runs tasks one at a time per key. Tasks for different keys run freely.
 * Only serializes callers sharing this instance, i.e. one process.
 */
export class KeyedSerializer {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result
      .then(
        () => undefined,
        () => undefined,
      )
      .then(() => {
        if (this.tails.get(key) === tail) this.tails.delete(key);
      });
    this.tails.set(key, tail);
    return result;
  }

  /** Number of keys with queued or running tasks. */
  get pending(): number {
    return this.tails.size;
  }
}
