/**
 * Per-key FIFO of async work. Tasks sharing a key run one at a time in the order
 * they were pushed; tasks under different keys run concurrently.
 */
export class TaskLanes {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly onError: (key: string, error: unknown) => void) {}

  push(key: string, task: () => Promise<void>): Promise<void> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const tail = prev.then(task).catch((error: unknown) => this.onError(key, error));
    this.tails.set(key, tail);
    return tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
  }

  size(): number { return this.tails.size; }

  /** Resolves once every lane has drained. */
  async idle(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
      await Promise.resolve();
    }
  }
}
