/**
 * Throughput, latency and health observations for one stream.
 *
 * Stages report events through the MetricsRecorder hooks; `sample()` turns
 * the running counters into a snapshot. Sampling can also run on a timer
 * via `start()`, notifying `onSample` listeners.
 */

import {
  DEFAULT_LATENCY_WINDOW,
  DEFAULT_METRICS_HISTORY,
  DEFAULT_METRICS_INTERVAL_MS,
  DEFAULT_THROUGHPUT_WINDOW_MS,
} from '@/constants.js';
import {
  assessHealth,
  computeTrend,
  DEFAULT_HEALTH_THRESHOLDS,
  type HealthReport,
  type HealthThresholds,
  type Trend,
} from '@/metrics/health.js';
import { BoundedRingBuffer } from '@/queue/BoundedRingBuffer.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';

const TICK_HISTORY = 64;

/**
 * Hooks the ingestion stages call as data flows through them.
 */
export interface MetricsRecorder {
  recordReceived(bytes: number): void;
  recordDecoded(): void;
  recordDecodeFailure(): void;
  recordOverflow(): void;
  recordDropped(): void;
  recordConsumed(latencyMs: number): void;
  observeQueue(size: number, capacity: number): void;
}

export interface MetricsTotals {
  bytesReceived: number;
  messagesDecoded: number;
  decodeFailures: number;
  overflows: number;
  dropped: number;
  consumed: number;
}

export interface MetricsSnapshot {
  timestamp: number;
  totals: MetricsTotals;
  messagesPerSecond: number;
  meanLatencyMs: number;
  p99LatencyMs: number;
  queueSize: number;
  queueCapacity: number;
  queueFillRatio: number;
  decodeSuccessRatio: number;
  health: HealthReport;
  trends: {
    throughput: Trend;
    latency: Trend;
  };
}

export type SampleListener = (snapshot: MetricsSnapshot) => void;

export interface StreamMetricsOptions {
  /** Latency samples averaged into meanLatencyMs (default: 100) */
  latencyWindow?: number;
  /** Trailing window for messagesPerSecond (default: 1000ms) */
  throughputWindowMs?: number;
  /** Snapshots retained by getHistory() (default: 120) */
  historySize?: number;
  thresholds?: HealthThresholds;
  now?: () => number;
}

interface Tick {
  at: number;
  consumed: number;
}

export class StreamMetricsCollector implements MetricsRecorder {
  private readonly totals: MetricsTotals = {
    bytesReceived: 0,
    messagesDecoded: 0,
    decodeFailures: 0,
    overflows: 0,
    dropped: 0,
    consumed: 0,
  };
  private readonly latencies: BoundedRingBuffer<number>;
  private readonly ticks = new BoundedRingBuffer<Tick>(TICK_HISTORY);
  private readonly history: BoundedRingBuffer<MetricsSnapshot>;
  private readonly listeners = new Set<SampleListener>();
  private readonly throughputWindowMs: number;
  private readonly thresholds: HealthThresholds;
  private readonly now: () => number;
  private queueSize = 0;
  private queueCapacity = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    options: StreamMetricsOptions = {},
    private readonly log: Logger = createLogger('metrics')
  ) {
    this.latencies = new BoundedRingBuffer(options.latencyWindow ?? DEFAULT_LATENCY_WINDOW);
    this.history = new BoundedRingBuffer(options.historySize ?? DEFAULT_METRICS_HISTORY);
    this.throughputWindowMs = options.throughputWindowMs ?? DEFAULT_THROUGHPUT_WINDOW_MS;
    this.thresholds = options.thresholds ?? DEFAULT_HEALTH_THRESHOLDS;
    this.now = options.now ?? Date.now;
    this.ticks.enqueue({ at: this.now(), consumed: 0 });
  }

  // ==========================================================================
  // Recording hooks
  // ==========================================================================

  recordReceived(bytes: number): void {
    this.totals.bytesReceived += bytes;
  }

  recordDecoded(): void {
    this.totals.messagesDecoded++;
  }

  recordDecodeFailure(): void {
    this.totals.decodeFailures++;
  }

  recordOverflow(): void {
    this.totals.overflows++;
  }

  recordDropped(): void {
    this.totals.dropped++;
  }

  recordConsumed(latencyMs: number): void {
    this.totals.consumed++;
    this.latencies.enqueue(Math.max(0, latencyMs));
  }

  observeQueue(size: number, capacity: number): void {
    this.queueSize = size;
    this.queueCapacity = capacity;
  }

  // ==========================================================================
  // Sampling
  // ==========================================================================

  /**
   * Compute a snapshot from the current counters and store it in the history.
   */
  sample(): MetricsSnapshot {
    const timestamp = this.now();
    const messagesPerSecond = this.throughputAt(timestamp);
    this.ticks.enqueue({ at: timestamp, consumed: this.totals.consumed });

    const latencies = this.latencies.toArray();
    const meanLatencyMs = mean(latencies);
    const queueFillRatio = this.queueCapacity === 0 ? 0 : this.queueSize / this.queueCapacity;
    const attempted = this.totals.messagesDecoded + this.totals.decodeFailures;
    const decodeSuccessRatio = attempted === 0 ? 1 : this.totals.messagesDecoded / attempted;

    const history = this.history.toArray();
    const previous = history[history.length - 1];

    const snapshot: MetricsSnapshot = {
      timestamp,
      totals: { ...this.totals },
      messagesPerSecond,
      meanLatencyMs,
      p99LatencyMs: percentile(latencies, 0.99),
      queueSize: this.queueSize,
      queueCapacity: this.queueCapacity,
      queueFillRatio,
      decodeSuccessRatio,
      health: assessHealth(
        { queueFillRatio, decodeSuccessRatio, messagesPerSecond, backlog: this.queueSize },
        this.thresholds
      ),
      trends: {
        throughput: previous
          ? computeTrend(previous.messagesPerSecond, messagesPerSecond)
          : 'stable',
        latency: previous ? computeTrend(previous.meanLatencyMs, meanLatencyMs) : 'stable',
      },
    };

    this.history.enqueue(snapshot);
    return snapshot;
  }

  /**
   * Sample every `intervalMs` and notify listeners.
   */
  start(intervalMs: number = DEFAULT_METRICS_INTERVAL_MS): void {
    if (this.timer) {
      return;
    }
    this.log.debug(`Sampling every ${intervalMs}ms`);
    this.timer = setInterval(() => {
      const snapshot = this.sample();
      this.listeners.forEach((listener) => listener(snapshot));
    }, intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Subscribe to periodic snapshots.
   *
   * @returns Unsubscribe function
   */
  onSample(listener: SampleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Retained snapshots, oldest first.
   */
  getHistory(): MetricsSnapshot[] {
    return this.history.toArray();
  }

  getTotals(): MetricsTotals {
    return { ...this.totals };
  }

  /**
   * Consumed messages per second over the trailing window.
   *
   * The reference point is the oldest tick inside the window, or the most
   * recent tick before it when the window holds none.
   */
  private throughputAt(timestamp: number): number {
    const windowStart = timestamp - this.throughputWindowMs;
    const ticks = this.ticks.toArray();

    let reference = ticks.find((tick) => tick.at >= windowStart && tick.at < timestamp);
    if (!reference) {
      reference = ticks.filter((tick) => tick.at < windowStart).pop();
    }
    if (!reference) {
      return 0;
    }

    const elapsedMs = timestamp - reference.at;
    if (elapsedMs <= 0) {
      return 0;
    }
    return ((this.totals.consumed - reference.consumed) * 1000) / elapsedMs;
  }
}

function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Nearest-rank percentile.
 */
export function percentile(values: number[], fraction: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.max(1, Math.ceil(fraction * sorted.length));
  return sorted[rank - 1] ?? 0;
}
