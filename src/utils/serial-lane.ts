/**
 * Runs async tasks one at a time in submission order. A failed task rejects
 * its own promise and does not stall the ones queued behind it.
 */
export class SerialLane {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const next = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
