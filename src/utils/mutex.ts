/**
 * Promise-chain lock. Callbacks passed to `runExclusive` run one at a time, in
 * call order; a rejected callback releases the lock for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  private pending = 0;

  get isLocked() {
    return this.pending > 0;
  }

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  private release() {
    this.pending -= 1;
  }
}
