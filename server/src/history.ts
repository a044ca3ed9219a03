/**
 * Fixed-capacity LIFO over a ring of slots. Pushing onto a full history
 * overwrites (and returns) the oldest entry. Capacity 0 keeps nothing.
 */
export class UndoHistory<T> {
  private readonly slots: Array<T | undefined>;
  // Slot the next push writes to.
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`capacity must be a non-negative integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  push(item: T): T | undefined {
    if (this.capacity === 0) return item;

    const evicted = this.count === this.capacity ? this.slots[this.head] : undefined;
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
    return evicted;
  }

  peek(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[this.lastSlot()];
  }

  pop(): T | undefined {
    if (this.count === 0) return undefined;
    const slot = this.lastSlot();
    const item = this.slots[slot];
    this.slots[slot] = undefined;
    this.head = slot;
    this.count -= 1;
    return item;
  }

  private lastSlot(): number {
    return (this.head - 1 + this.capacity) % this.capacity;
  }
}
