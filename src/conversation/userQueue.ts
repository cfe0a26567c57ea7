/**
 * Runs tasks one after another per key while different keys run concurrently.
 * A failed task does not block the tasks queued behind it.
 */
export class KeyedSerialQueue<K> {
  private readonly tails = new Map<K, Promise<void>>();

  public run(key: K, task: () => Promise<void>): Promise<void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const release = (): void => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
    const tail: Promise<void> = current.then(release, release);
    this.tails.set(key, tail);
    return current;
  }

  public get pending(): number {
    return this.tails.size;
  }
}
