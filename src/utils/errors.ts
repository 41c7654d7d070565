/**
 * Error handling utilities.
 *
 * Base class for every stream-layer error plus helpers for working with
 * values of unknown type in catch clauses.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base error class for all ingestion errors.
 *
 * Extends native Error with error codes for programmatic handling,
 * exit codes for semantic exit codes, and cause chaining for nested errors.
 */
export abstract class StreamError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Configuration value could not be used.
 *
 * Examples:
 * - INGEST_MAX_PENDING=abc
 * - Negative connect timeout
 */
export class ConfigError extends StreamError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = EXIT_CODES.INVALID_ARGUMENTS;
}

/**
 * Extract error message from unknown error type.
 *
 * @example
 * ```typescript
 * try {
 *   await transport.connect(endpoint);
 * } catch (error) {
 *   console.error(`Failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalize an unknown thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extract exit code from error object.
 *
 * @param error - Error that may carry an exitCode property
 * @param fallback - Exit code used when the error has none
 */
export function getExitCode(
  error: unknown,
  fallback: number = EXIT_CODES.UNHANDLED_EXCEPTION
): number {
  if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
    return error.exitCode;
  }
  return fallback;
}
