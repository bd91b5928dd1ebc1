/**
 * KeyedSerialQueue
 *
 * Single writer per key: tasks for the same key run one at a time in
 * submission order, tasks for different keys run concurrently. Each key
 * holds one promise chain, removed once its last task settles.
 */
export class KeyedSerialQueue {
  private tails: Map<string, Promise<void>> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    const result = previous.then(task);
    // The chain survives a failed task; the caller still sees the rejection
    const tail: Promise<void> = result
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      });
    this.tails.set(key, tail);

    return result;
  }

  /**
   * Keys with queued or running work.
   */
  get activeKeys(): number {
    return this.tails.size;
  }

  /**
   * Resolves once every task submitted so far has settled.
   */
  async drain(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }
}
