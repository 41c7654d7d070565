/**
 * Transport layer error classes.
 *
 * Connection-level problems surface as these errors; record-level problems
 * never do (they are reported as diagnostics instead).
 */

import { StreamError } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Connection failed or was lost.
 *
 * Examples:
 * - Connection refused, non-2xx handshake response
 * - Socket closed with an abnormal code
 * - Keepalive detected a dead peer
 * - send() while not connected
 */
export class StreamConnectionError extends StreamError {
  readonly code = 'STREAM_CONNECTION_ERROR';
  readonly exitCode = EXIT_CODES.STREAM_CONNECTION_FAILURE;
}

/**
 * Transport did not become ready within the connect window.
 */
export class StreamTimeoutError extends StreamError {
  readonly code = 'STREAM_TIMEOUT_ERROR';
  readonly exitCode = EXIT_CODES.STREAM_TIMEOUT;
}

/**
 * Endpoint URL is malformed or uses a scheme the transport cannot serve.
 */
export class InvalidEndpointError extends StreamError {
  readonly code = 'INVALID_ENDPOINT';
  readonly exitCode = EXIT_CODES.INVALID_URL;
}

/**
 * Server refused an outbound request.
 */
export class StreamRequestError extends StreamError {
  readonly code = 'STREAM_REQUEST_ERROR';
  readonly exitCode = EXIT_CODES.STREAM_CONNECTION_FAILURE;

  /** HTTP status of the rejected request, when one was received */
  readonly status: number | undefined;

  constructor(message: string, status?: number, cause?: Error) {
    super(message, cause);
    this.status = status;
  }
}

/**
 * receiveStream() called again for a connection that already has a consumer.
 */
export class StreamConsumerError extends StreamError {
  readonly code = 'STREAM_CONSUMER_CONFLICT';
  readonly exitCode = EXIT_CODES.SOFTWARE_ERROR;
}

/**
 * Connection state change not allowed by the state machine (programming error).
 */
export class StateTransitionError extends StreamError {
  readonly code = 'STATE_TRANSITION_ERROR';
  readonly exitCode = EXIT_CODES.SOFTWARE_ERROR;
}
