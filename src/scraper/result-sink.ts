/**
 * Result Sink
 *
 * Bounded hand-off queue between many producers and one consumer.
 * Producers suspend in put() while the buffer is full; the consumer
 * receives items in arrival order.
 */

interface PendingPut<T> {
  item: T;
  resolve: () => void;
}

export class ResultSink<T extends NonNullable<unknown>> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly pendingPuts: PendingPut<T>[] = [];
  private readonly waitingTakers: Array<(item: T | undefined) => void> = [];
  private isClosed = false;

  constructor(readonly capacity = 100) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Result sink capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Items buffered and not yet taken */
  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async put(item: T): Promise<void> {
    if (this.isClosed) {
      throw new Error('Cannot put into a closed result sink');
    }

    const taker = this.waitingTakers.shift();
    if (taker) {
      taker(item);
      return;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return;
    }

    await new Promise<void>((resolve) => {
      this.pendingPuts.push({ item, resolve });
    });
  }

  /**
   * Next item, or undefined once the sink is closed and drained
   */
  take(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      const item = this.buffer.shift();
      this.admitPendingPut();
      return Promise.resolve(item);
    }

    if (this.isClosed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.waitingTakers.push(resolve);
    });
  }

  /**
   * Stop accepting items. Buffered and already-suspended items are
   * still delivered.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    if (this.buffer.length === 0 && this.pendingPuts.length === 0) {
      for (const taker of this.waitingTakers.splice(0)) {
        taker(undefined);
      }
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.take();
      if (item === undefined) {
        return;
      }
      yield item;
    }
  }

  private admitPendingPut(): void {
    const pending = this.pendingPuts.shift();
    if (pending) {
      this.buffer.push(pending.item);
      pending.resolve();
    }
  }
}
