/**
 * FIFO async mutex. Callers queue in arrival order; a task that throws
 * still releases the lock.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get locked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.release(),
      () => this.release(),
    );
    return run;
  }

  private release(): void {
    this.pending -= 1;
  }
}
