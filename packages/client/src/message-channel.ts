/**
 * Bounded FIFO between the socket's event handlers and the single consumer
 * on the dispatching path. On overflow the oldest entry is dropped.
 */
export class MessageChannel<T> {
  private items: T[] = [];
  private waiters = new Set<() => void>();
  private closed = false;

  constructor(
    private readonly capacity: number,
    private readonly onDrop?: (dropped: T) => void,
  ) {}

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    if (this.items.length >= this.capacity) {
      const dropped = this.items.shift();
      if (dropped !== undefined) this.onDrop?.(dropped);
    }
    this.items.push(item);
    this.wake();
  }

  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  /** Resolves true once an item is queued, false when the timeout passes first. */
  waitForData(timeoutMs: number): Promise<boolean> {
    if (this.items.length > 0) return Promise.resolve(true);
    if (this.closed || timeoutMs <= 0) return Promise.resolve(false);
    return new Promise<boolean>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve(this.items.length > 0);
      };
      const timer = setTimeout(done, timeoutMs);
      timer.unref();
      this.waiters.add(done);
    });
  }

  /** Releases current waiters; later waits return at once. Items still drain. */
  close(): void {
    this.closed = true;
    this.wake();
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) waiter();
  }
}
