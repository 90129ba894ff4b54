/**
 * Runs tasks one at a time per key, in submission order.
 * Tasks for different keys run concurrently.
 */
export class KeyedSerialExecutor {
  private tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The tail must never reject, or the next task would be skipped
    const tail = result.then(() => undefined, () => undefined);
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
