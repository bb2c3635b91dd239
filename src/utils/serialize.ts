/**
 * Runs submitted tasks one at a time, in submission order
 *
 * A failing task does not break the chain; its error is delivered to the
 * caller that submitted it.
 */
export class OperationQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
