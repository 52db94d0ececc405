/**
 * Runs async tasks strictly one after another, in submission order.
 *
 * discord.js hands interactions over concurrently; anything that does a
 * check-then-write against shared state goes through one of these.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Queue a task. The returned promise settles with the task's own outcome.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);

    // The caller observes the task's rejection through `result`; the chain
    // only needs to know the task is finished.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );

    return result;
  }
}
