export interface SubmitResult<T> {
  /** The oldest item, evicted to make room. */
  dropped?: T;
}

/** Bounded FIFO between ingestion channels and the arbiter; full queues shed their oldest item. */
export class EventQueue<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  submit(item: T): SubmitResult<T> {
    let dropped: T | undefined;
    if (this.items.length >= this.capacity) {
      dropped = this.items.shift();
    }
    this.items.push(item);
    return dropped === undefined ? {} : { dropped };
  }

  drain(maxBatch: number): T[] {
    if (maxBatch <= 0 || this.items.length === 0) return [];
    return this.items.splice(0, maxBatch);
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
