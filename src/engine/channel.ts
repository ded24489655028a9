/**
 * OutcomeChannel: single-consumer mailbox between completing work units
 * and the run's coordinating loop.
 *
 * Any number of producers may post; exactly one consumer takes. Messages
 * are delivered in post order. Once closed, posts are refused and the
 * caller decides what to do with the message.
 */
export class OutcomeChannel<M> {
  private buffer: M[] = [];
  private waiter: ((message: M) => void) | undefined;
  private closed = false;

  /**
   * Deliver a message. Returns false if the channel is closed.
   */
  post(message: M): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(message);
    } else {
      this.buffer.push(message);
    }
    return true;
  }

  /**
   * Wait for the next message.
   */
  take(): Promise<M> {
    if (this.closed) {
      return Promise.reject(new Error("OutcomeChannel is closed"));
    }
    if (this.waiter) {
      return Promise.reject(new Error("OutcomeChannel already has a waiting consumer"));
    }

    const next = this.buffer.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    return new Promise<M>((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Refuse further posts and hand back anything still buffered.
   */
  close(): M[] {
    this.closed = true;
    const remaining = this.buffer;
    this.buffer = [];
    return remaining;
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }
}
