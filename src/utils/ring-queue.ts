/**
 * RingQueue — Fixed-capacity FIFO queue backed by a ring buffer.
 *
 * When full, `push` evicts the oldest item and reports it, so producers
 * never wait on slow consumers.
 */
interface Slot<T> {
  value: T;
}

export class RingQueue<T> {
  private buffer: (Slot<T> | undefined)[];
  private head = 0; // next read position
  private count = 0;
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('RingQueue capacity must be an integer >= 1');
    }
    this.capacity = capacity;
    this.buffer = new Array(capacity);
  }

  /**
   * Append an item. Returns `{ evicted: true, item }` when the oldest
   * queued item had to make room.
   */
  push(item: T): { evicted: false } | { evicted: true; item: T } {
    const tail = (this.head + this.count) % this.capacity;

    if (this.count < this.capacity) {
      this.buffer[tail] = { value: item };
      this.count++;
      return { evicted: false };
    }

    // Full: tail === head, overwrite the oldest and advance
    const oldest = this.buffer[this.head];
    this.buffer[this.head] = { value: item };
    this.head = (this.head + 1) % this.capacity;
    return oldest ? { evicted: true, item: oldest.value } : { evicted: false };
  }

  /**
   * Remove and return the oldest item.
   */
  shift(): { done: true } | { done: false; item: T } {
    const slot = this.count > 0 ? this.buffer[this.head] : undefined;
    if (!slot) return { done: true };
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return { done: false, item: slot.value };
  }

  get length(): number {
    return this.count;
  }

  clear(): void {
    this.buffer = new Array(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
