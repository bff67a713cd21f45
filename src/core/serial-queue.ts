/**
 * Runs tasks one at a time in the order they were queued. A rejected task is
 * reported to its own caller only; the next task still runs.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  get size(): number {
    return this.pending;
  }
}
