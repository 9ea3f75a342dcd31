import { QueueClosedError } from './errors';

interface PendingPut<T> {
  item: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * Bounded FIFO between the scanner (single producer) and the sniper loop
 * (single consumer). `put` waits while the queue is full and never drops.
 * After `close`, the consumer drains what is left and then receives `undefined`.
 */
export class CandidateQueue<T> {
  private readonly items: T[] = [];
  private readonly putters: PendingPut<T>[] = [];
  private readonly takers: Array<(item: T | undefined) => void> = [];
  private closed = false;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of producers currently blocked on a full queue. */
  get blockedProducers(): number {
    return this.putters.length;
  }

  public put(item: T): Promise<void> {
    if (this.closed) return Promise.reject(new QueueClosedError());

    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return Promise.resolve();
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.putters.push({ item, resolve, reject });
    });
  }

  public take(): Promise<T | undefined> {
    const head = this.items.shift();
    if (head !== undefined) {
      this.admitBlockedProducer();
      return Promise.resolve(head);
    }
    if (this.closed) return Promise.resolve(undefined);
    return new Promise(resolve => this.takers.push(resolve));
  }

  /**
   * Stops accepting new items. Producers still waiting for room are rejected;
   * items already queued stay available to the consumer.
   */
  public close() {
    if (this.closed) return;
    this.closed = true;
    for (const putter of this.putters.splice(0)) putter.reject(new QueueClosedError());
    for (const taker of this.takers.splice(0)) taker(undefined);
  }

  private admitBlockedProducer() {
    const next = this.putters.shift();
    if (!next) return;
    this.items.push(next.item);
    next.resolve();
  }
}
