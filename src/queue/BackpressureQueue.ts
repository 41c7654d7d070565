/**
 * Bounded, rate-aware queue between a producer and a single consumer.
 *
 * The producer side never waits: `enqueue` either stores the item or
 * throws CapacityExceededError at once, leaving the shedding decision to
 * the caller. The consumer side waits for items and is paced so that two
 * dequeues are at least `processingRateMs` apart.
 *
 * All state changes happen in synchronous sections; nothing is held across
 * an await.
 */

import { DEFAULT_MAX_PENDING, DEFAULT_PROCESSING_RATE_MS } from '@/constants.js';
import { CapacityExceededError, QueueClosedError, QueueConsumerError } from '@/queue/errors.js';
import { delay } from '@/utils/concurrency.js';
import { toError } from '@/utils/errors.js';

// Error Messages
const QUEUE_CLOSED_ERROR = 'Queue is closed';
const CONSUMER_CONFLICT_ERROR = 'Queue already has a waiting consumer';

export interface BackpressureQueueOptions {
  /** Items held before enqueue is rejected (default: 1000) */
  maxPending?: number;
  /** Minimum milliseconds between dequeues (default: 1) */
  processingRateMs?: number;
  /** Clock used for pacing */
  now?: () => number;
}

interface Waiter {
  resolve: () => void;
}

export class BackpressureQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private closed = false;
  private waiter: Waiter | null = null;
  private consumerActive = false;
  private lastDequeueAt: number | null = null;
  private readonly maxPending: number;
  private readonly processingRateMs: number;
  private readonly now: () => number;

  constructor(options: BackpressureQueueOptions = {}) {
    this.maxPending = options.maxPending ?? DEFAULT_MAX_PENDING;
    this.processingRateMs = options.processingRateMs ?? DEFAULT_PROCESSING_RATE_MS;
    this.now = options.now ?? Date.now;

    if (!Number.isInteger(this.maxPending) || this.maxPending < 1) {
      throw new RangeError(`maxPending must be a positive integer, got ${this.maxPending}`);
    }
    if (this.processingRateMs < 0) {
      throw new RangeError(`processingRateMs cannot be negative, got ${this.processingRateMs}`);
    }
  }

  /**
   * Add an item for the consumer.
   *
   * @throws CapacityExceededError when maxPending items are already held
   * @throws QueueClosedError after close()
   */
  enqueue(item: T): void {
    if (this.closed) {
      throw new QueueClosedError(QUEUE_CLOSED_ERROR);
    }
    if (this.items.length >= this.maxPending) {
      throw new CapacityExceededError(this.maxPending);
    }
    this.items.push(item);
    this.wake();
  }

  /**
   * Wait for the next item.
   *
   * Resolves with undefined once the queue is closed and empty.
   *
   * @param signal - Aborts the wait; the promise rejects with the abort reason
   * @throws QueueConsumerError if another dequeue is already waiting
   */
  async dequeue(signal?: AbortSignal): Promise<T | undefined> {
    if (this.consumerActive) {
      throw new QueueConsumerError(CONSUMER_CONFLICT_ERROR);
    }
    this.consumerActive = true;

    try {
      for (;;) {
        if (signal?.aborted) {
          throw toError(signal.reason);
        }

        if (this.items.length === 0) {
          if (this.closed) {
            return undefined;
          }
          await this.waitForItem(signal);
          continue;
        }

        const wait = this.pacingDelay();
        if (wait > 0) {
          await delay(wait, signal);
          continue;
        }

        this.lastDequeueAt = this.now();
        return this.items.shift();
      }
    } finally {
      this.consumerActive = false;
    }
  }

  /**
   * Stop accepting items. Items already queued can still be dequeued.
   */
  close(): void {
    this.closed = true;
    this.wake();
  }

  /**
   * Discard every queued item.
   *
   * @returns Number of items discarded
   */
  clear(): number {
    const discarded = this.items.length;
    this.items = [];
    return discarded;
  }

  get size(): number {
    return this.items.length;
  }

  get capacity(): number {
    return this.maxPending;
  }

  /**
   * Fraction of capacity in use, between 0 and 1.
   */
  get fillRatio(): number {
    return this.items.length / this.maxPending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.dequeue();
      if (item === undefined) {
        return;
      }
      yield item;
    }
  }

  private pacingDelay(): number {
    if (this.lastDequeueAt === null || this.processingRateMs === 0) {
      return 0;
    }
    return this.lastDequeueAt + this.processingRateMs - this.now();
  }

  private waitForItem(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiter = null;
        reject(toError(signal?.reason));
      };

      this.waiter = {
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve();
    }
  }
}
