/**
 * Per-key promise chain. Tasks sharing a key run one after another;
 * tasks on different keys run independently. A failed task rejects
 * its own caller and does not block the next one.
 */
export class WriteQueue {
  private readonly tails = new Map<string, Promise<void>>();

  enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task);

    let tail: Promise<void>;
    tail = next
      .then(
        () => undefined,
        () => undefined
      )
      .finally(() => {
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      });
    this.tails.set(key, tail);

    return next;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
