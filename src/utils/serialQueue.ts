/**
 * Runs async tasks one at a time, in submission order.
 * A task's rejection is delivered to its own caller and never blocks the tasks behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release(),
    );
    return result;
  }

  /** Resolves once every task submitted so far has finished. */
  async drain(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }

  get size(): number {
    return this.pending;
  }

  private release(): void {
    this.pending--;
  }
}
