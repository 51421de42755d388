/**
 * In-process mutual exclusion for one session.
 *
 * Operations run strictly one at a time in the order `runExclusive` was
 * called, which is also how two commands with the same client timestamp are
 * ordered: first to arrive at the lock wins.
 */
export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  runExclusive<T>(operation: () => T | Promise<T>): Promise<T> {
    this.queued += 1;
    const run = this.tail.then(operation);
    // The chain only sequences; the caller receives the rejection through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run.finally(() => {
      this.queued -= 1;
    });
  }

  /** Operations waiting or running. */
  get pending(): number {
    return this.queued;
  }

  get isLocked(): boolean {
    return this.queued > 0;
  }
}
