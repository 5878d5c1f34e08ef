/**
 * Matchflow — Serial Queue
 *
 * Runs async tasks one at a time in submission order. A failed task does
 * not block the ones queued after it.
 */

export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task, task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /** Tasks submitted and not yet settled. */
  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
