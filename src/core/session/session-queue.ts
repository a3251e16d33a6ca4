/**
 * Per-session message queue.
 *
 * Tasks for the same key run strictly one after another; tasks for
 * different keys never wait on each other. A failed task does not block
 * the ones queued behind it.
 */
export class SessionQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
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

  /** Keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }
}
