/**
 * Runs tasks one at a time in submission order. A task starts only after the
 * previous one has settled, so async work inside a task never interleaves
 * with another task.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller receives the failure through `result`; the chain only waits.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
