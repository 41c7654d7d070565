/**
 * Synthetic load through the real pipeline.
 *
 * Records are generated in bursts, framed and decoded by a MessagePipeline
 * and stored in a BoundedRingBuffer that a simulated consumer drains between
 * bursts. When the consumer falls behind the ring evicts its oldest entries,
 * which the report counts as dropped.
 */

import {
  DEFAULT_BENCH_BURST,
  DEFAULT_BENCH_CAPACITY,
  DEFAULT_BENCH_DRAIN,
  DEFAULT_BENCH_MESSAGE_SIZE,
  DEFAULT_BENCH_MESSAGES,
} from '@/constants.js';
import { percentile } from '@/metrics/StreamMetricsCollector.js';
import { MessagePipeline } from '@/pipeline/MessagePipeline.js';
import { isStreamMessage } from '@/pipeline/schema.js';
import type { DecodedMessage } from '@/pipeline/types.js';
import { BoundedRingBuffer } from '@/queue/BoundedRingBuffer.js';
import type { StreamMessage } from '@/types.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';
import { yieldToEventLoop } from '@/utils/concurrency.js';

const BENCH_METHOD = 'bench.tick';

export interface LoadTestOptions {
  /** Records to generate (default: 10000) */
  messageCount?: number;
  /** Ring buffer capacity (default: 1000) */
  capacity?: number;
  /** Records per burst (default: 100) */
  burstSize?: number;
  /** Records the consumer takes after each burst (default: 80) */
  drainSize?: number;
  /** Approximate size of each record in bytes (default: 256) */
  messageSize?: number;
  /** Every n-th record is corrupted to exercise the failure path (default: never) */
  corruptEvery?: number;
  now?: () => number;
  onProgress?: (progress: LoadTestProgress) => void;
}

export interface LoadTestProgress {
  sent: number;
  received: number;
  dropped: number;
  total: number;
}

export interface LoadTestResult {
  sent: number;
  received: number;
  dropped: number;
  decodeFailures: number;
  durationMs: number;
  /** Highest per-burst consumer rate, messages per second */
  peakThroughput: number;
  averageLatencyMs: number;
  p99LatencyMs: number;
  /** received / sent (1 when nothing was sent) */
  successRate: number;
}

interface ResolvedLoadTest {
  messageCount: number;
  capacity: number;
  burstSize: number;
  drainSize: number;
  messageSize: number;
  corruptEvery: number;
}

const INVALID_OPTION_ERROR = (name: string, value: number): string =>
  `${name} must be a positive integer, got ${value}`;

function resolveOptions(options: LoadTestOptions): ResolvedLoadTest {
  const resolved: ResolvedLoadTest = {
    messageCount: options.messageCount ?? DEFAULT_BENCH_MESSAGES,
    capacity: options.capacity ?? DEFAULT_BENCH_CAPACITY,
    burstSize: options.burstSize ?? DEFAULT_BENCH_BURST,
    drainSize: options.drainSize ?? DEFAULT_BENCH_DRAIN,
    messageSize: options.messageSize ?? DEFAULT_BENCH_MESSAGE_SIZE,
    corruptEvery: options.corruptEvery ?? 0,
  };

  for (const name of ['capacity', 'burstSize', 'drainSize'] as const) {
    const value = resolved[name];
    if (!Number.isInteger(value) || value < 1) {
      throw new RangeError(INVALID_OPTION_ERROR(name, value));
    }
  }
  if (!Number.isInteger(resolved.messageCount) || resolved.messageCount < 0) {
    throw new RangeError(INVALID_OPTION_ERROR('messageCount', resolved.messageCount));
  }
  return resolved;
}

/**
 * One synthetic JSONL record (without the newline), padded toward `size` bytes.
 *
 * @example
 * ```typescript
 * buildRecord(1, 0) // '{"id":1,"method":"bench.tick","params":{"seq":1,"payload":""}}'
 * ```
 */
export function buildRecord(sequence: number, size: number): string {
  const base = JSON.stringify({
    id: sequence,
    method: BENCH_METHOD,
    params: { seq: sequence, payload: '' },
  });
  const padding = Math.max(0, size - base.length);
  return JSON.stringify({
    id: sequence,
    method: BENCH_METHOD,
    params: { seq: sequence, payload: 'x'.repeat(padding) },
  });
}

/**
 * Run a count-based load test.
 *
 * @throws RangeError for a non-positive capacity, burst or drain size
 */
export async function runLoadTest(
  options: LoadTestOptions = {},
  log: Logger = createLogger('bench')
): Promise<LoadTestResult> {
  const settings = resolveOptions(options);
  const now = options.now ?? Date.now;

  const pipeline = new MessagePipeline<StreamMessage>({ schema: isStreamMessage, now }, log);
  const ring = new BoundedRingBuffer<DecodedMessage<StreamMessage>>(settings.capacity);
  const latencies: number[] = [];

  let sent = 0;
  let received = 0;
  let decodeFailures = 0;
  let peakThroughput = 0;

  const drain = (max: number): number => {
    const batch = ring.dequeueBatch(max);
    const at = now();
    for (const message of batch) {
      latencies.push(at - message.receivedAt);
    }
    received += batch.length;
    return batch.length;
  };

  log.debug(
    `Load test: ${settings.messageCount} records of ~${settings.messageSize} bytes, ` +
      `capacity ${settings.capacity}, burst ${settings.burstSize}, drain ${settings.drainSize}`
  );

  const startedAt = now();
  let burstStartedAt = startedAt;

  while (sent < settings.messageCount) {
    const count = Math.min(settings.burstSize, settings.messageCount - sent);
    const records: string[] = [];
    for (let i = 1; i <= count; i++) {
      const sequence = sent + i;
      const corrupt = settings.corruptEvery > 0 && sequence % settings.corruptEvery === 0;
      records.push(corrupt ? `{"id":${sequence},` : buildRecord(sequence, settings.messageSize));
    }
    sent += count;

    for (const item of pipeline.process(`${records.join('\n')}\n`)) {
      if (item.kind === 'message') {
        ring.enqueue(item);
      } else if (item.kind === 'decode_failure') {
        decodeFailures++;
      }
    }

    const drained = drain(settings.drainSize);
    const finishedAt = now();
    const elapsedMs = finishedAt - burstStartedAt;
    if (elapsedMs > 0) {
      peakThroughput = Math.max(peakThroughput, (drained * 1000) / elapsedMs);
    }
    burstStartedAt = finishedAt;

    options.onProgress?.({
      sent,
      received,
      dropped: ring.metrics().dropped,
      total: settings.messageCount,
    });
    await yieldToEventLoop();
  }

  while (!ring.isEmpty) {
    drain(settings.drainSize);
  }

  const durationMs = now() - startedAt;
  const dropped = ring.metrics().dropped;
  const averageLatencyMs =
    latencies.length === 0
      ? 0
      : latencies.reduce((sum, value) => sum + value, 0) / latencies.length;

  const result: LoadTestResult = {
    sent,
    received,
    dropped,
    decodeFailures,
    durationMs,
    peakThroughput,
    averageLatencyMs,
    p99LatencyMs: percentile(latencies, 0.99),
    successRate: sent === 0 ? 1 : received / sent,
  };

  log.debug(
    `Load test finished in ${durationMs}ms: ${received}/${sent} received, ${dropped} dropped`
  );
  return result;
}
