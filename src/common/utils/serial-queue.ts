/**
 * Runs async tasks one at a time in submission order.
 *
 * A task starts only after the previous one has settled, whether it
 * resolved or rejected. Each caller receives its own task's outcome.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once every task queued so far has settled. */
  onIdle(): Promise<void> {
    return this.tail;
  }
}
