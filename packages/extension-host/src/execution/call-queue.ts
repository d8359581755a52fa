/**
 * Strict FIFO queue for calls into one plugin instance.
 *
 * A guest instance is not re-entrant, so each task starts only after the
 * previous one has settled. A failed task does not stall the tasks behind it.
 */

export class CallQueue {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  /** Tasks queued or running. */
  get pending(): number {
    return this.depth;
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.depth++;
    const run = this.tail.then(task);
    const settled = () => {
      this.depth--;
    };
    // The chain continues past a rejected task; `run` carries the rejection.
    this.tail = run.then(settled, settled);
    return run;
  }

  /** Resolves once every task enqueued so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }
}
