/** Fixed-capacity FIFO that drops its oldest item when full. */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  /** Appends `item`, returning the evicted oldest item when the buffer was full. */
  push(item: T): T | undefined {
    if (this.length < this.capacity) {
      this.slots[(this.head + this.length) % this.capacity] = item;
      this.length += 1;
      return undefined;
    }
    const dropped = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return dropped;
  }

  shift(): T | undefined {
    if (this.length === 0) return undefined;
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.length -= 1;
    return item;
  }

  toArray(): T[] {
    const items: T[] = [];
    for (let idx = 0; idx < this.length; idx += 1) {
      const item = this.slots[(this.head + idx) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.length = 0;
  }
}
