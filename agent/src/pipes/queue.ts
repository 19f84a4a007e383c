/**
 * Single-consumer FIFO. `next()` resolves when an item arrives, or with
 * null once the queue is closed.
 */

export class AsyncQueue<T> {
  private items: T[] = [];
  private waiter: ((item: T | null) => void) | null = null;
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) throw new Error("Queue is closed");
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return;
    }
    this.items.push(item);
  }

  next(): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) return Promise.reject(new Error("Queue already has a consumer"));
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  /** Remove and return everything still queued */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  close(): void {
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }
}
