import type { MetricsSnapshot } from '@/metrics/StreamMetricsCollector.js';
import type { Trend } from '@/metrics/health.js';
import {
  formatBytes,
  formatMs,
  formatPercent,
  formatRate,
  OutputFormatter,
} from '@/ui/formatting.js';

const TREND_ARROWS: Record<Trend, string> = {
  up: '↑',
  down: '↓',
  stable: '→',
};

/**
 * One-line periodic metrics report.
 *
 * @example
 * ```
 * 12.0 msg/s ↑ | latency 3.50ms (p99 9.00ms) → | queue 3/100 (3.0%) | decoded 100.0% | healthy
 * ```
 */
export function formatMetricsLine(snapshot: MetricsSnapshot): string {
  const throughputTrend = TREND_ARROWS[snapshot.trends.throughput];
  const latencyTrend = TREND_ARROWS[snapshot.trends.latency];
  const latency = `${formatMs(snapshot.meanLatencyMs)} (p99 ${formatMs(snapshot.p99LatencyMs)})`;
  const fill = formatPercent(snapshot.queueFillRatio);

  return [
    `${formatRate(snapshot.messagesPerSecond)} ${throughputTrend}`,
    `latency ${latency} ${latencyTrend}`,
    `queue ${snapshot.queueSize}/${snapshot.queueCapacity} (${fill})`,
    `decoded ${formatPercent(snapshot.decodeSuccessRatio)}`,
    snapshot.health.overall,
  ].join(' | ');
}

/**
 * End-of-stream metrics summary.
 */
export function formatMetricsSummary(snapshot: MetricsSnapshot): string {
  const { totals, health } = snapshot;
  const fmt = new OutputFormatter();

  fmt.text('Stream Metrics').separator('━', 50);
  fmt.keyValueList(
    [
      ['Received', formatBytes(totals.bytesReceived)],
      ['Decoded', totals.messagesDecoded.toString()],
      ['Consumed', totals.consumed.toString()],
      ['Decode failures', totals.decodeFailures.toString()],
      ['Overflows', totals.overflows.toString()],
      ['Dropped', totals.dropped.toString()],
    ],
    18
  );

  fmt.blank().text('Health').separator('━', 50);
  fmt.keyValueList(
    [
      ['Overall', health.overall],
      ['Queue', health.queue],
      ['Decoder', health.decoder],
      ['Consumer', health.consumer],
    ],
    18
  );

  return fmt.build();
}
