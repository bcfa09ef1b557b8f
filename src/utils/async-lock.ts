/**
 * Promise-chain lock giving a resource a single owner at a time
 */

export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `task` once every previously queued task has settled
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
