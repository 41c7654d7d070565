/**
 * Semantic exit codes for scriptable error handling.
 *
 * **STABILITY: These exit codes are part of the CLI's stable public API.**
 *
 * Exit codes follow semantic ranges for predictable automation:
 * - **0**: Success (command completed successfully)
 * - **1**: Generic failure (avoid in new code)
 * - **80-99**: User errors (invalid input, bad endpoint, bad configuration)
 * - **100-119**: Software errors (connection failures, timeouts, capacity limits)
 *
 * **Versioning guarantees:**
 * - Exit code values are **stable** and will not change in minor versions
 * - New exit codes may be added in minor versions (within existing ranges)
 * - Exit code semantics (meaning) will remain consistent across versions
 *
 * Reference: https://developer.squareup.com/blog/command-line-observability-with-semantic-exit-codes/
 */

/**
 * Exit code constants following semantic ranges.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99): Issues caused by user input or environment

  /** Endpoint is not a valid http(s) or ws(s) URL */
  INVALID_URL: 80,

  /** Invalid command-line arguments, options or environment overrides */
  INVALID_ARGUMENTS: 81,

  // Software Errors (100-119): Stream and integration failures

  /** Transport could not connect, or the connection was lost */
  STREAM_CONNECTION_FAILURE: 101,

  /** Connect window elapsed before the transport was ready */
  STREAM_TIMEOUT: 102,

  /** Backpressure queue rejected an item under the fail shedding policy */
  CAPACITY_EXCEEDED: 103,

  /** A record grew past the line buffer limit under the fail overflow policy */
  BUFFER_OVERFLOW: 104,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 105,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
