/**
 * Mutex - single-writer boundary for async settlement calls.
 *
 * Callers queue on a promise chain; each critical section starts only after
 * the previous one settled (fulfilled or rejected). Not re-entrant.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of sections running or waiting. */
  get waiting(): number {
    return this.pending;
  }

  get locked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(fn).finally(() => {
      this.pending--;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
