/**
 * Status lines for the stream command. All of them go to stderr.
 */

import { formatPercent } from '@/ui/formatting.js';

export function connectingMessage(endpoint: string, transport: string): string {
  return `Connecting to ${endpoint} (${transport})...`;
}

export function connectedMessage(endpoint: string): string {
  return `Streaming from ${endpoint}`;
}

export function retryingMessage(delayMs: number, attempt: number, maxAttempts: number): string {
  return `Disconnected, retrying in ${delayMs}ms (attempt ${attempt}/${maxAttempts})`;
}

export function streamEndedMessage(received: number): string {
  return `Stream ended after ${received} message${received === 1 ? '' : 's'}`;
}

export function interruptedMessage(): string {
  return 'Interrupted, disconnecting...';
}

/**
 * Data-quality warning raised when the decode success ratio degrades.
 *
 * @example
 * ```typescript
 * dataQualityWarning(0.9, 'critical');
 * // 'Warning: data quality critical, only 90.0% of records decoded'
 * ```
 */
export function dataQualityWarning(successRatio: number, level: string): string {
  return `Warning: data quality ${level}, only ${formatPercent(successRatio)} of records decoded`;
}

export function decodeFailureMessage(diagnostic: string): string {
  return `Skipped record: ${diagnostic}`;
}

export function overflowMessage(discardedBytes: number, limit: number): string {
  return `Line buffer overflow: discarded ${discardedBytes} bytes (limit ${limit})`;
}
