/**
 * @description: Single-writer promise queue that serializes ledger mutations.
 * @ledger-scope: utility
 * @ledger-module: SerialQueue
 * @ledger-risk: high - Interleaved writes would fork the hash chain.
 * @ledger-ethics: low - Orders work without inspecting it.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;

  get pending(): number {
    return this.pendingCount;
  }

  /**
   * Runs task after every previously queued task has settled. The returned
   * promise carries the task's own result or rejection.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pendingCount += 1;
    const result = this.tail.then(async () => {
      try {
        return await task();
      } finally {
        this.pendingCount -= 1;
      }
    });

    // Failures reach the caller through `result`; the chain itself keeps moving.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Resolves once everything queued so far has settled. */
  onIdle(): Promise<void> {
    return this.tail;
  }
}
