/**
 * Runs async tasks one at a time, in submission order. A task that throws
 * releases the lock for the next one and rejects its own caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get locked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const run = this.tail.then(() => task());
    this.tail = run.then(
      () => { this.pending--; },
      () => { this.pending--; }
    );
    return run;
  }
}
