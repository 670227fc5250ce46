/**
 * Single-consumer async queue. Any number of producers push; one consumer
 * drains in arrival order with `for await` and waits only while the queue
 * is empty.
 */
export class SessionQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private head = 0;
  private closed = false;
  private wake: (() => void) | null = null;
  private consuming = false;

  /** Returns false once the queue is closed. */
  push(item: T): boolean {
    if (this.closed) return false;
    this.items.push(item);
    this.notify();
    return true;
  }

  /** No further pushes; the consumer ends after draining what is queued. */
  close(): void {
    this.closed = true;
    this.notify();
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consuming) throw new Error('SessionQueue already has a consumer');
    this.consuming = true;
    while (true) {
      if (this.head < this.items.length) {
        const item = this.items[this.head++];
        if (this.head === this.items.length) {
          this.items = [];
          this.head = 0;
        }
        yield item;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    if (wake) wake();
  }
}

export default SessionQueue;
