/**
 * Runs async tasks one at a time, in submission order.
 */
export class WriteQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // A failed task rejects its own promise; the chain keeps going
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
