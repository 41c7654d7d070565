/**
 * Unit tests for BoundedRingBuffer
 *
 * Tests the contract: FIFO order, writes never fail, the oldest item is
 * evicted and counted once the buffer is full.
 */

import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { BoundedRingBuffer } from '@/queue/BoundedRingBuffer.js';

void describe('BoundedRingBuffer', () => {
  void it('returns items oldest first', () => {
    const ring = new BoundedRingBuffer<string>(3);
    ring.enqueue('a');
    ring.enqueue('b');

    assert.equal(ring.dequeue(), 'a');
    assert.equal(ring.dequeue(), 'b');
    assert.equal(ring.dequeue(), undefined);
    assert.equal(ring.isEmpty, true);
  });

  void it('evicts the oldest item when full', () => {
    const ring = new BoundedRingBuffer<number>(3);
    assert.equal(ring.enqueue(1), undefined);
    ring.enqueue(2);
    ring.enqueue(3);

    const result = ring.enqueue(4);

    assert.deepEqual(result, { evicted: 1 });
    assert.deepEqual(ring.toArray(), [2, 3, 4]);
    assert.equal(ring.size, 3);
    assert.equal(ring.metrics().dropped, 1);
  });

  void it('keeps order across wrap-around', () => {
    const ring = new BoundedRingBuffer<string>(3);
    ring.enqueue('a');
    ring.enqueue('b');
    ring.dequeue();
    ring.enqueue('c');
    ring.enqueue('d');

    assert.deepEqual(ring.toArray(), ['b', 'c', 'd']);
    assert.equal(ring.isFull, true);
    assert.equal(ring.peek(), 'b');
    assert.equal(ring.size, 3);
  });

  void it('dequeues a batch of at most the requested size', () => {
    const ring = new BoundedRingBuffer<number>(5);
    [1, 2, 3].forEach((n) => ring.enqueue(n));

    assert.deepEqual(ring.dequeueBatch(2), [1, 2]);
    assert.deepEqual(ring.dequeueBatch(10), [3]);
    assert.deepEqual(ring.dequeueBatch(10), []);
  });

  void it('clear() empties the buffer but keeps lifetime counters', () => {
    const ring = new BoundedRingBuffer<number>(2);
    [1, 2, 3].forEach((n) => ring.enqueue(n));

    ring.clear();

    assert.equal(ring.size, 0);
    assert.equal(ring.peek(), undefined);
    assert.equal(ring.metrics().totalEnqueued, 3);
    assert.equal(ring.metrics().dropped, 1);
  });

  void it('reports utilization and drop rate', () => {
    const ring = new BoundedRingBuffer<number>(4);
    [1, 2, 3].forEach((n) => ring.enqueue(n));
    ring.dequeue();

    assert.deepEqual(ring.metrics(), {
      capacity: 4,
      size: 2,
      totalEnqueued: 3,
      totalDequeued: 1,
      dropped: 0,
      utilizationPercent: 50,
      dropRatePercent: 0,
    });

    const small = new BoundedRingBuffer<number>(2);
    [1, 2, 3, 4].forEach((n) => small.enqueue(n));
    assert.equal(small.metrics().dropRatePercent, 50);
  });

  void it('rejects a capacity below one', () => {
    assert.throws(() => new BoundedRingBuffer(0), RangeError);
    assert.throws(() => new BoundedRingBuffer(1.5), RangeError);
  });
});
