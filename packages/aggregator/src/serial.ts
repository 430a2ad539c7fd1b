/**
 * Runs queued tasks one at a time, in submission order.
 *
 * A task that rejects does not stall the queue; its rejection reaches
 * only its own caller.
 */
export class SerialExecutor {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  get pending(): number {
    return this._pending;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this._pending++;
    const result = this._tail.then(task);
    this._tail = result.then(
      () => {
        this._pending--;
      },
      () => {
        this._pending--;
      },
    );
    return result;
  }

  /** Resolves once everything queued so far has finished. */
  idle(): Promise<void> {
    return this._tail;
  }
}
