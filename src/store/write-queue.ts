/**
 * WriteQueue — Serialized async write queue for trajectory output.
 * Ensures writes are processed one at a time even though they're async.
 */

interface WriteTask {
  name: string;
  fn: () => Promise<void>;
}

export class WriteQueue {
  private queue: WriteTask[] = [];
  private processing = false;
  private idleWaiters: Array<() => void> = [];

  /**
   * Enqueue a write task.
   * Resolves when the task completes, rejects with its error.
   */
  async enqueue(name: string, fn: () => Promise<void>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.queue.push({
        name,
        fn: async () => {
          try {
            await fn();
            resolve();
          } catch (err) {
            reject(err);
          }
        },
      });
      void this.process();
    });
  }

  private async process(): Promise<void> {
    if (this.processing) {
      return;
    }

    this.processing = true;

    try {
      while (this.queue.length > 0) {
        const task = this.queue.shift();
        // task.fn settles the enqueue() promise itself and never throws
        if (task) {
          await task.fn();
        }
      }
    } finally {
      this.processing = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const wake of waiters) wake();
    }
  }

  /**
   * Wait until the queue is drained, including tasks enqueued while waiting.
   */
  async flush(): Promise<void> {
    if (this.queue.length === 0 && !this.processing) {
      return;
    }
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  isProcessing(): boolean {
    return this.processing;
  }
}
