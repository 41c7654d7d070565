/**
 * Fixed-capacity circular buffer with oldest-first eviction.
 *
 * Writes never fail: when every slot is taken the oldest item is
 * overwritten and counted as dropped. Used where losing old data is
 * acceptable (load harness sink, metric sample windows).
 */

interface Slot<T> {
  value: T;
}

export interface RingBufferMetrics {
  capacity: number;
  size: number;
  totalEnqueued: number;
  totalDequeued: number;
  dropped: number;
  /** size / capacity, as a percentage */
  utilizationPercent: number;
  /** dropped / totalEnqueued, as a percentage */
  dropRatePercent: number;
}

export class BoundedRingBuffer<T> {
  private readonly slots: Array<Slot<T> | undefined>;
  private head = 0;
  private count = 0;
  private totalEnqueued = 0;
  private totalDequeued = 0;
  private dropped = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Slot<T> | undefined>(capacity).fill(undefined);
  }

  /**
   * Store an item, evicting the oldest one when full.
   *
   * @returns The evicted item wrapped in a slot, or undefined when nothing was evicted
   */
  enqueue(item: T): { evicted: T } | undefined {
    this.totalEnqueued++;

    if (this.count === this.capacity) {
      const oldest = this.slots[this.head];
      this.slots[this.head] = { value: item };
      this.head = (this.head + 1) % this.capacity;
      this.dropped++;
      return oldest ? { evicted: oldest.value } : undefined;
    }

    this.slots[(this.head + this.count) % this.capacity] = { value: item };
    this.count++;
    return undefined;
  }

  /**
   * Remove and return the oldest item.
   */
  dequeue(): T | undefined {
    const slot = this.take();
    return slot?.value;
  }

  /**
   * Remove up to `max` items, oldest first.
   */
  dequeueBatch(max: number): T[] {
    const batch: T[] = [];
    while (batch.length < max) {
      const slot = this.take();
      if (!slot) {
        break;
      }
      batch.push(slot.value);
    }
    return batch;
  }

  /**
   * Return the oldest item without removing it.
   */
  peek(): T | undefined {
    return this.count === 0 ? undefined : this.slots[this.head]?.value;
  }

  /**
   * Snapshot of the contents, oldest first.
   */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const slot = this.slots[(this.head + i) % this.capacity];
      if (slot) {
        items.push(slot.value);
      }
    }
    return items;
  }

  /**
   * Empty the buffer. Lifetime counters are kept.
   */
  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }

  metrics(): RingBufferMetrics {
    return {
      capacity: this.capacity,
      size: this.count,
      totalEnqueued: this.totalEnqueued,
      totalDequeued: this.totalDequeued,
      dropped: this.dropped,
      utilizationPercent: (this.count / this.capacity) * 100,
      dropRatePercent: this.totalEnqueued === 0 ? 0 : (this.dropped / this.totalEnqueued) * 100,
    };
  }

  private take(): Slot<T> | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const slot = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    this.totalDequeued++;
    return slot;
  }
}
