/**
 * Single-consumer FIFO that producers push into from any callback. The
 * consumer awaits `next()`, which resolves `undefined` once the inbox is
 * closed. Items still queued at close time are discarded.
 */
export class EventInbox<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  public push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    this.items.push(item);
    return true;
  }

  public next(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.items.length = 0;

    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public size(): number {
    return this.items.length;
  }
}
