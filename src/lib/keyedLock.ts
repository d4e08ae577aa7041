/**
 * Serializes async tasks per key. Tasks sharing a key run one at a time in
 * arrival order; tasks under different keys run independently.
 *
 * A failed task does not block the queue behind it.
 */
export class KeyedLock<K = string> {
  private readonly tails = new Map<K, Promise<void>>();

  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  isLocked(key: K): boolean {
    return this.tails.has(key);
  }
}
