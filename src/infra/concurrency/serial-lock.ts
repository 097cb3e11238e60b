/**
 * Promise-chained mutex. Tasks passed to runExclusive run one at a time, in call order.
 * A failing task rejects its own caller only; the chain continues.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
