/**
 * Runs async operations one at a time, in arrival order.
 *
 * A process-local lock: an operation starts only after every operation queued
 * before it has settled, whatever the outcome.
 * @example
 * ```typescript
 * const queue = new OperationQueue();
 * const [a, b] = await Promise.all([
 *   queue.run(() => loadThing()),
 *   queue.run(() => saveThing()), // starts after loadThing settles
 * ]);
 * ```
 * @public
 */
export class OperationQueue {
  private operationQueue: Array<() => Promise<void>> = [];
  private operationInProgress = false;

  /**
   * Queue an operation
   * @returns Promise settling with the operation's own result
   */
  public run<T>(operation: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const task = async () => {
        try {
          resolve(await operation());
        } catch (error) {
          reject(error);
        } finally {
          this.processNextOperation();
        }
      };

      this.operationQueue.push(task);

      if (!this.operationInProgress) {
        this.processNextOperation();
      }
    });
  }

  /**
   * Operations waiting behind the running one
   */
  public get pending(): number {
    return this.operationQueue.length;
  }

  public get busy(): boolean {
    return this.operationInProgress;
  }

  private processNextOperation(): void {
    const nextTask = this.operationQueue.shift();
    if (!nextTask) {
      this.operationInProgress = false;
      return;
    }

    this.operationInProgress = true;
    void nextTask();
  }
}
