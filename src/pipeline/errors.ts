import { StreamError } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Unterminated record exceeded the line buffer limit under the 'fail' policy.
 *
 * `records` holds the complete records extracted from the same chunk before
 * the overflowing tail, so the caller can still deliver them.
 */
export class BufferOverflowError extends StreamError {
  readonly code = 'BUFFER_OVERFLOW';
  readonly exitCode = EXIT_CODES.BUFFER_OVERFLOW;

  constructor(
    message: string,
    readonly discardedBytes: number,
    readonly limit: number,
    readonly records: readonly string[] = []
  ) {
    super(message);
  }
}
