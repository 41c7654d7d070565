/**
 * Health classification for a running stream.
 *
 * Health is observational: it is reported to the user and never changes
 * how the pipeline behaves.
 */

import {
  DECODE_SUCCESS_CRITICAL,
  DECODE_SUCCESS_WARNING,
  MIN_CONSUMER_THROUGHPUT,
  QUEUE_FILL_CRITICAL,
  QUEUE_FILL_WARNING,
  TREND_THRESHOLD,
} from '@/constants.js';

export type HealthLevel = 'healthy' | 'warning' | 'critical';

export type Trend = 'up' | 'down' | 'stable';

export interface HealthThresholds {
  /** Queue fill ratio at which the queue is a warning (default: 0.7) */
  queueFillWarning: number;
  /** Queue fill ratio at which the queue is critical (default: 0.9) */
  queueFillCritical: number;
  /** Decode success ratio below which the decoder is a warning (default: 0.99) */
  decodeSuccessWarning: number;
  /** Decode success ratio below which the decoder is critical (default: 0.95) */
  decodeSuccessCritical: number;
  /** Consumer messages per second expected while a backlog exists (default: 10) */
  minConsumerThroughput: number;
}

export const DEFAULT_HEALTH_THRESHOLDS: HealthThresholds = {
  queueFillWarning: QUEUE_FILL_WARNING,
  queueFillCritical: QUEUE_FILL_CRITICAL,
  decodeSuccessWarning: DECODE_SUCCESS_WARNING,
  decodeSuccessCritical: DECODE_SUCCESS_CRITICAL,
  minConsumerThroughput: MIN_CONSUMER_THROUGHPUT,
};

export interface HealthInputs {
  queueFillRatio: number;
  decodeSuccessRatio: number;
  messagesPerSecond: number;
  /** Items currently waiting in the queue */
  backlog: number;
}

export interface HealthReport {
  overall: HealthLevel;
  queue: HealthLevel;
  decoder: HealthLevel;
  consumer: HealthLevel;
}

const SEVERITY: Record<HealthLevel, number> = {
  healthy: 0,
  warning: 1,
  critical: 2,
};

export function classifyQueue(fillRatio: number, thresholds: HealthThresholds): HealthLevel {
  if (fillRatio >= thresholds.queueFillCritical) {
    return 'critical';
  }
  if (fillRatio >= thresholds.queueFillWarning) {
    return 'warning';
  }
  return 'healthy';
}

export function classifyDecoder(successRatio: number, thresholds: HealthThresholds): HealthLevel {
  if (successRatio < thresholds.decodeSuccessCritical) {
    return 'critical';
  }
  if (successRatio < thresholds.decodeSuccessWarning) {
    return 'warning';
  }
  return 'healthy';
}

/**
 * A consumer is only judged while items are waiting for it.
 */
export function classifyConsumer(
  messagesPerSecond: number,
  backlog: number,
  thresholds: HealthThresholds
): HealthLevel {
  if (backlog === 0) {
    return 'healthy';
  }
  if (messagesPerSecond === 0) {
    return 'critical';
  }
  if (messagesPerSecond < thresholds.minConsumerThroughput) {
    return 'warning';
  }
  return 'healthy';
}

export function worstOf(...levels: HealthLevel[]): HealthLevel {
  return levels.reduce<HealthLevel>(
    (worst, level) => (SEVERITY[level] > SEVERITY[worst] ? level : worst),
    'healthy'
  );
}

/**
 * Classify every component and derive the overall level.
 *
 * @example
 * ```typescript
 * assessHealth({
 *   queueFillRatio: 0.75,
 *   decodeSuccessRatio: 1,
 *   messagesPerSecond: 40,
 *   backlog: 750,
 * });
 * // { overall: 'warning', queue: 'warning', decoder: 'healthy', consumer: 'healthy' }
 * ```
 */
export function assessHealth(
  inputs: HealthInputs,
  thresholds: HealthThresholds = DEFAULT_HEALTH_THRESHOLDS
): HealthReport {
  const queue = classifyQueue(inputs.queueFillRatio, thresholds);
  const decoder = classifyDecoder(inputs.decodeSuccessRatio, thresholds);
  const consumer = classifyConsumer(inputs.messagesPerSecond, inputs.backlog, thresholds);

  return { overall: worstOf(queue, decoder, consumer), queue, decoder, consumer };
}

/**
 * Direction of change between two observations.
 *
 * Changes smaller than `threshold` (relative to the previous value) are 'stable'.
 */
export function computeTrend(
  previous: number,
  current: number,
  threshold: number = TREND_THRESHOLD
): Trend {
  if (previous === 0) {
    return current > 0 ? 'up' : 'stable';
  }

  const change = (current - previous) / previous;
  if (change > threshold) {
    return 'up';
  }
  if (change < -threshold) {
    return 'down';
  }
  return 'stable';
}
