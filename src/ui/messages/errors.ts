/**
 * Error messages shown by the CLI.
 */

import { joinLines } from '@/ui/formatting.js';

/**
 * @example
 * ```typescript
 * console.error(genericError('Connection refused'));
 * // Error: Connection refused
 * ```
 */
export function genericError(message: string, context?: string): string {
  if (context) {
    return `Error: ${message}\n${context}`;
  }
  return `Error: ${message}`;
}

export function unknownError(): string {
  return 'Error: Unknown error';
}

/**
 * Suggestions printed under a connection error.
 *
 * @example
 * ```typescript
 * connectionFailedSuggestion('ws://localhost:8080/stream');
 * ```
 */
export function connectionFailedSuggestion(endpoint: string): string {
  return joinLines(
    `Could not stream from ${endpoint}`,
    '',
    'Suggestions:',
    '  Check that the server is running and reachable',
    '  Retry automatically:   ingest stream <endpoint> --retries 5',
    '  Show transport traces: ingest stream <endpoint> --debug'
  );
}

/**
 * Shown after the supervisor used up its reconnection attempts.
 */
export function reconnectExhaustedError(attempts: number, reason: string): string {
  return joinLines(
    `Error: Stream lost and ${attempts} reconnection attempts failed`,
    `Last error: ${reason}`
  );
}
