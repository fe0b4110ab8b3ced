/**
 * OperationQueue — single-writer execution.
 *
 * Operations run one at a time in submission order. Each one runs to
 * completion, including every awaited value transfer, before the next
 * starts. A failed operation rejects its own promise and does not stop
 * the queue.
 */

export class OperationQueue {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  run<T>(operation: () => T | Promise<T>): Promise<T> {
    this._pending += 1;
    const result = this._tail.then(operation);
    this._tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result.finally(() => {
      this._pending -= 1;
    });
  }

  /** Operations submitted and not yet settled. */
  get pending(): number {
    return this._pending;
  }

  /** Resolves once everything submitted so far has settled. */
  idle(): Promise<void> {
    return this._tail;
  }
}
