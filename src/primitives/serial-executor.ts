/**
 * @module primitives/serial-executor
 * @description Single-owner task queue. Tasks run one at a time in
 * submission order; a task never starts before the previous one settled.
 */

export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();

  /**
   * Queue `task` behind everything already submitted.
   * The returned promise settles with the task's own outcome; a failing
   * task does not poison the queue for later ones.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(() => task());
    this.tail = result.catch(() => undefined);
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}
