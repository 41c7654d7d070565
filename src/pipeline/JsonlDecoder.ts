/**
 * Per-record JSON decoding.
 *
 * Every record is parsed in isolation: a malformed record becomes a
 * DecodeFailure value and never affects the records around it.
 */

import { DEFAULT_MAX_MESSAGE_BYTES, UTF8_ENCODING } from '@/constants.js';
import type { DecodedMessage, DecodeFailure, MessageSchema } from '@/pipeline/types.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

// Diagnostics
const SCHEMA_MISMATCH_DIAGNOSTIC = 'Record does not match the expected message shape';
const INVALID_JSON_DIAGNOSTIC = (errorMsg: string): string => `Invalid JSON: ${errorMsg}`;
const RECORD_TOO_LARGE_DIAGNOSTIC = (size: number, limit: number): string =>
  `Record of ${size} bytes exceeds the ${limit} byte limit`;

export interface JsonlDecoderOptions<T> {
  /** Structural check every parsed value must pass */
  schema: MessageSchema<T>;
  /** Largest record accepted, in bytes (default: 1 MiB) */
  maxMessageBytes?: number;
  /** Clock used for receivedAt stamps */
  now?: () => number;
}

export class JsonlDecoder<T> {
  private readonly schema: MessageSchema<T>;
  private readonly maxMessageBytes: number;
  private readonly now: () => number;
  private sequence = 0;

  constructor(
    options: JsonlDecoderOptions<T>,
    private readonly log: Logger = createLogger('pipeline')
  ) {
    this.schema = options.schema;
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.now = options.now ?? Date.now;
  }

  /**
   * Decode one complete record.
   *
   * Duplicate keys resolve to the last value, as with `JSON.parse`.
   */
  decode(line: string): DecodedMessage<T> | DecodeFailure {
    const receivedAt = this.now();

    const size = Buffer.byteLength(line, UTF8_ENCODING);
    if (size > this.maxMessageBytes) {
      const diagnostic = RECORD_TOO_LARGE_DIAGNOSTIC(size, this.maxMessageBytes);
      return this.failure(line, diagnostic, receivedAt);
    }

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      return this.failure(line, INVALID_JSON_DIAGNOSTIC(getErrorMessage(error)), receivedAt);
    }

    if (!this.schema(value)) {
      return this.failure(line, SCHEMA_MISMATCH_DIAGNOSTIC, receivedAt);
    }

    this.sequence += 1;
    const message: DecodedMessage<T> = {
      kind: 'message',
      data: value,
      receivedAt,
      sequence: this.sequence,
    };
    return Object.freeze(message);
  }

  /**
   * Number of messages decoded so far.
   */
  get decodedCount(): number {
    return this.sequence;
  }

  private failure(line: string, diagnostic: string, receivedAt: number): DecodeFailure {
    this.log.debug(`Failed to decode JSONL record: ${diagnostic}`);
    const failure: DecodeFailure = { kind: 'decode_failure', line, diagnostic, receivedAt };
    return Object.freeze(failure);
  }
}
