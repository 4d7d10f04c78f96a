/**
 * Mailbox: an unbounded FIFO with a single async consumer.
 *
 * Producers `post()` from anywhere; the consumer iterates with `for await`.
 * After `close()` nothing new is accepted, queued messages are still
 * delivered, and then iteration ends.
 */

export class Mailbox<T> implements AsyncIterable<T> {
  private queue: { value: T }[] = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  /** Enqueue a message. Returns false once the mailbox is closed. */
  post(message: T): boolean {
    if (this.closed) return false;

    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake({ value: message, done: false });
    } else {
      this.queue.push({ value: message });
    }
    return true;
  }

  /**
   * Enqueue a message, folding it into the newest queued one when there is
   * one. The queue never grows past one slot per run of merged posts.
   */
  postMerged(message: T, merge: (queued: T, message: T) => T): boolean {
    const last = this.queue[this.queue.length - 1];
    if (this.closed || !last) return this.post(message);
    last.value = merge(last.value, message);
    return true;
  }

  /** Stop accepting messages and end iteration once the queue is empty. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake({ value: undefined, done: true });
    }
  }

  /** Remove and return every queued message. */
  drain(): T[] {
    const messages = this.queue.map((slot) => slot.value);
    this.queue = [];
    return messages;
  }

  get length(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const slot = this.queue.shift();
    if (slot) {
      return Promise.resolve<IteratorResult<T, undefined>>({ value: slot.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve<IteratorResult<T, undefined>>({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('Mailbox already has a pending consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
