/**
 * Fixed-capacity FIFO. Appends are O(1); once full, each append overwrites the
 * oldest entry regardless of how often it was read.
 */
export class BoundedHistory<T> {
  private slots: (T | undefined)[];
  private head = 0;   // index of the oldest entry
  private count = 0;
  private appended = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  get evicted(): number {
    return this.appended - this.count;
  }

  append(item: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = item;
    this.appended++;

    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /** Oldest first. The array is a copy; later appends do not show up in it. */
  snapshot(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }
}
