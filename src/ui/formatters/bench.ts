import type { LoadTestResult } from '@/harness/LoadHarness.js';
import {
  formatDuration,
  formatMs,
  formatPercent,
  formatRate,
  OutputFormatter,
} from '@/ui/formatting.js';

/**
 * Human-readable load test report.
 */
export function formatLoadTestResult(result: LoadTestResult): string {
  const fmt = new OutputFormatter();

  fmt.text('Load Test Results').separator('━', 50);
  fmt.keyValueList(
    [
      ['Sent', result.sent.toString()],
      ['Received', result.received.toString()],
      ['Dropped', result.dropped.toString()],
      ['Decode failures', result.decodeFailures.toString()],
      ['Success rate', formatPercent(result.successRate)],
    ],
    18
  );

  fmt.blank().text('Performance').separator('━', 50);
  fmt.keyValueList(
    [
      ['Duration', formatDuration(result.durationMs)],
      ['Peak throughput', formatRate(result.peakThroughput)],
      ['Average latency', formatMs(result.averageLatencyMs)],
      ['p99 latency', formatMs(result.p99LatencyMs)],
    ],
    18
  );

  return fmt.build();
}
