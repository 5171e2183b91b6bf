/**
 * Bounded single-consumer queue between watch workers and the classifier.
 *
 * Producers never wait: when the queue is full the new item is dropped
 * and counted. The consumer awaits `receive()`, which resolves with
 * `undefined` once the channel is closed and empty or the signal aborts.
 *
 * @module daemon/channel
 */

export class BoundedChannel<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Items rejected because the queue was full. */
  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Enqueue without waiting. Returns false when closed or full. */
  offer(item: T): boolean {
    if (this.closed) return false;

    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver(item);
      return true;
    }

    if (this.items.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }
    this.items.push(item);
    return true;
  }

  /** Next item, or undefined when the channel is closed and drained or `signal` aborts. */
  receive(signal?: AbortSignal): Promise<T | undefined> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed || signal?.aborted) return Promise.resolve(undefined);
    if (this.waiter) {
      return Promise.reject(new Error('BoundedChannel supports a single consumer'));
    }

    return new Promise<T | undefined>((resolve) => {
      const onAbort = (): void => {
        this.waiter = null;
        resolve(undefined);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = (item) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
    });
  }

  /** Take every queued item without waiting. */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  /** Refuse further items; a pending `receive()` resolves with undefined. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver(undefined);
    }
  }
}
