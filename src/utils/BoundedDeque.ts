/**
 * Fixed-capacity double-ended queue backed by a ring buffer.
 *
 * `pushFront` on a full deque evicts the element at the back, so after any
 * sequence of insertions the deque holds the most recent `capacity`
 * elements, newest first. A null capacity means unbounded.
 */
export class BoundedDeque<T> {
  private static readonly INITIAL_SLOTS = 16;

  private buffer: Array<T | undefined>;
  private head = 0; // index of the front element
  private count = 0;

  constructor(private readonly capacity: number | null) {
    if (capacity !== null && (!Number.isInteger(capacity) || capacity < 1)) {
      throw new RangeError(`Deque capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<T | undefined>(Math.min(capacity ?? Infinity, BoundedDeque.INITIAL_SLOTS));
  }

  get size(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.capacity !== null && this.count === this.capacity;
  }

  /**
   * Insert at the front. Returns the evicted back element, if any.
   */
  pushFront(item: T): T | undefined {
    let evicted: T | undefined;

    if (this.isFull) {
      evicted = this.popBack();
    } else if (this.count === this.buffer.length) {
      this.grow();
    }

    this.head = (this.head - 1 + this.buffer.length) % this.buffer.length;
    this.buffer[this.head] = item;
    this.count++;
    return evicted;
  }

  popBack(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const tail = (this.head + this.count - 1) % this.buffer.length;
    const item = this.buffer[tail];
    this.buffer[tail] = undefined;
    this.count--;
    return item;
  }

  /**
   * Front-to-back snapshot
   */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head + i) % this.buffer.length];
      if (item !== undefined) {
        items.push(item);
      }
    }
    return items;
  }

  /** Doubles the buffer, never past the capacity */
  private grow(): void {
    const items = this.toArray();
    const doubled = this.buffer.length * 2;
    this.buffer = new Array<T | undefined>(this.capacity === null ? doubled : Math.min(doubled, this.capacity));
    items.forEach((item, index) => {
      this.buffer[index] = item;
    });
    this.head = 0;
  }
}
