/**
 * Runs async tasks one at a time, in submission order.
 * A failing task rejects its own promise only; the queue keeps going.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    // Later tasks wait for this one to settle, whether it failed or not
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
