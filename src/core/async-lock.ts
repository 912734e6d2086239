/**
 * Promise-chained mutual exclusion.
 *
 * Tasks run one at a time in the order `runExclusive` was called. A task that throws
 * releases the lock and rejects only its own caller.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Whether a task is running or waiting. */
  get isLocked(): boolean {
    return this.pending > 0;
  }
}
