/**
 * Queue error classes.
 */

import { StreamError } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Queue already holds its maximum number of pending items.
 *
 * Thrown synchronously to the producer; the item is not stored.
 */
export class CapacityExceededError extends StreamError {
  readonly code = 'CAPACITY_EXCEEDED';
  readonly exitCode = EXIT_CODES.CAPACITY_EXCEEDED;

  constructor(readonly limit: number) {
    super(`Backpressure limit exceeded: ${limit} items pending`);
  }
}

/**
 * Item offered to a queue that has been closed.
 */
export class QueueClosedError extends StreamError {
  readonly code = 'QUEUE_CLOSED';
  readonly exitCode = EXIT_CODES.SOFTWARE_ERROR;
}

/**
 * A second consumer tried to wait on a single-consumer queue.
 */
export class QueueConsumerError extends StreamError {
  readonly code = 'QUEUE_CONSUMER_CONFLICT';
  readonly exitCode = EXIT_CODES.SOFTWARE_ERROR;
}
