/**
 * Async mutual exclusion. Tasks run one at a time in the order they were
 * queued; a task that rejects still hands the lock to the next one.
 *
 * Share one instance between every allocator that must not race on the same
 * ports (the container registers it as a singleton).
 */
export class AllocationLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public get isLocked(): boolean {
    return this.pending > 0;
  }

  public async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);
    this.pending++;

    await previous;
    try {
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }
}
