/**
 * Promise-chained mutual exclusion: callers run one at a time, in call order.
 * A rejected task releases the lock for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}
