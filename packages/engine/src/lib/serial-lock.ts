/**
 * Promise-chain mutex. Callers run one at a time in arrival order; a failed
 * holder releases the lock and its error reaches only its own caller.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    // Failures surface through `result`; the chain only tracks completion.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once every queued holder has finished. */
  idle(): Promise<void> {
    return this.tail;
  }
}
