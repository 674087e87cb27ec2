/**
 * FIFO buffer of stream elements. Elements are boxed, so `undefined` is a
 * legitimate element and emptiness is tracked by size alone.
 */
export class ElementQueue<T> {
  private slots: Array<{ value: T }> = [];
  private head = 0;

  get size(): number {
    return this.slots.length - this.head;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  push(value: T): void {
    this.slots.push({ value });
  }

  /** @throws Error when the queue is empty */
  shift(): T {
    const slot = this.slots[this.head];
    if (slot === undefined) {
      throw new Error("Cannot shift from an empty queue");
    }
    this.head++;
    if (this.head > 64 && this.head * 2 > this.slots.length) {
      this.slots = this.slots.slice(this.head);
      this.head = 0;
    }
    return slot.value;
  }

  /** Element at `offset` from the head. */
  at(offset: number): T {
    const slot = this.slots[this.head + offset];
    if (offset < 0 || slot === undefined) {
      throw new RangeError(`No element at offset ${offset} (size ${this.size})`);
    }
    return slot.value;
  }

  /** Discard the first `count` elements. */
  drop(count: number): void {
    for (let i = 0; i < count && !this.isEmpty; i++) {
      this.shift();
    }
  }

  clear(): void {
    this.slots = [];
    this.head = 0;
  }
}
