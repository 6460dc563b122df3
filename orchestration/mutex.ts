/**
 * FIFO async lock. Tasks queued through `runExclusive` run one at a time in
 * the order they were submitted; a failing task does not poison the queue.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
