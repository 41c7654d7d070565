/**
 * LoadHarness unit tests
 *
 * A fixed clock keeps the timing fields at zero so the counts can be
 * asserted exactly.
 */

import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  buildRecord,
  runLoadTest,
  type LoadTestProgress,
} from '@/harness/LoadHarness.js';
import { createLogger } from '@/ui/logging/index.js';

const mockLogger = createLogger('bench');
const fixedNow = (): number => 1000;

void describe('buildRecord', () => {
  void it('builds a compact record without padding', () => {
    assert.equal(
      buildRecord(1, 0),
      '{"id":1,"method":"bench.tick","params":{"seq":1,"payload":""}}'
    );
  });

  void it('pads the payload up to the requested size', () => {
    const record = buildRecord(3, 80);

    assert.equal(record.length, 80);
    assert.deepEqual(JSON.parse(record), {
      id: 3,
      method: 'bench.tick',
      params: { seq: 3, payload: 'x'.repeat(18) },
    });
  });
});

void describe('runLoadTest', () => {
  void it('counts evictions when the consumer falls behind', async () => {
    const progress: LoadTestProgress[] = [];

    const result = await runLoadTest(
      {
        messageCount: 10,
        capacity: 4,
        burstSize: 5,
        drainSize: 2,
        messageSize: 0,
        now: fixedNow,
        onProgress: (update) => progress.push(update),
      },
      mockLogger
    );

    assert.deepEqual(result, {
      sent: 10,
      received: 6,
      dropped: 4,
      decodeFailures: 0,
      durationMs: 0,
      peakThroughput: 0,
      averageLatencyMs: 0,
      p99LatencyMs: 0,
      successRate: 0.6,
    });
    assert.deepEqual(progress, [
      { sent: 5, received: 2, dropped: 1, total: 10 },
      { sent: 10, received: 4, dropped: 4, total: 10 },
    ]);
  });

  void it('counts corrupted records as decode failures', async () => {
    const result = await runLoadTest(
      {
        messageCount: 10,
        capacity: 100,
        burstSize: 10,
        drainSize: 10,
        corruptEvery: 5,
        now: fixedNow,
      },
      mockLogger
    );

    assert.equal(result.decodeFailures, 2);
    assert.equal(result.received, 8);
    assert.equal(result.dropped, 0);
    assert.equal(result.successRate, 0.8);
  });

  void it('reports full success for an empty run', async () => {
    const result = await runLoadTest({ messageCount: 0, now: fixedNow }, mockLogger);

    assert.equal(result.sent, 0);
    assert.equal(result.successRate, 1);
  });

  void it('rejects non-positive sizes', async () => {
    await assert.rejects(runLoadTest({ capacity: 0 }, mockLogger), {
      name: 'RangeError',
      message: 'capacity must be a positive integer, got 0',
    });
    await assert.rejects(runLoadTest({ drainSize: 1.5 }, mockLogger), {
      message: 'drainSize must be a positive integer, got 1.5',
    });
  });
});
