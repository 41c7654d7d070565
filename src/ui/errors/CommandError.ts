/**
 * Errors raised by CLI commands.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Extra context printed under a command error.
 */
export interface ErrorMetadata {
  /** What the user can do about it */
  suggestion?: string;
  /** Technical detail */
  note?: string;
}

/**
 * A command failed in a way the user can act on.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Unknown transport "tcp"',
 *   { suggestion: 'Use --transport sse or --transport ws' },
 *   EXIT_CODES.INVALID_ARGUMENTS
 * );
 * ```
 */
export class CommandError extends Error {
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommandError);
    }
  }
}
