/**
 * Newline framing for streaming byte input.
 *
 * Bytes are buffered until a `\n` arrives, so a record split across any
 * number of chunks (including inside a multi-byte UTF-8 sequence) is
 * reassembled before it is decoded. Only complete records are emitted.
 */

import { DEFAULT_MAX_BUFFER_BYTES, UTF8_ENCODING } from '@/constants.js';
import { BufferOverflowError } from '@/pipeline/errors.js';
import type { BufferOverflow, OverflowPolicy, RawChunk } from '@/pipeline/types.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';

const LF = 0x0a;
const CR = 0x0d;

const BUFFER_OVERFLOW_MESSAGE = (discardedBytes: number, limit: number): string =>
  `Line buffer overflow: discarded ${discardedBytes} bytes without a newline (limit ${limit})`;

export interface LineAccumulatorOptions {
  /** Maximum bytes held for an unterminated record (default: 1 MiB) */
  maxBufferSize?: number;
  /** Behaviour when the limit is exceeded (default: 'reset') */
  overflowPolicy?: OverflowPolicy;
}

/**
 * Convert a chunk into a Buffer without copying where possible.
 */
export function toBuffer(chunk: RawChunk): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, UTF8_ENCODING);
  }
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

export class LineAccumulator {
  /** Chunks of the unterminated record, joined once its newline arrives */
  private pending: Buffer[] = [];
  private pendingLength = 0;
  private readonly maxBufferSize: number;
  private readonly overflowPolicy: OverflowPolicy;

  constructor(
    options: LineAccumulatorOptions = {},
    private readonly log: Logger = createLogger('pipeline')
  ) {
    this.maxBufferSize = options.maxBufferSize ?? DEFAULT_MAX_BUFFER_BYTES;
    this.overflowPolicy = options.overflowPolicy ?? 'reset';
    if (!Number.isInteger(this.maxBufferSize) || this.maxBufferSize < 1) {
      throw new RangeError(`maxBufferSize must be a positive integer, got ${this.maxBufferSize}`);
    }
  }

  /**
   * Append a chunk and extract every complete record it finishes.
   *
   * Records are returned in arrival order with the newline (and a trailing
   * `\r`) removed. Blank and whitespace-only records are skipped. If the
   * leftover partial record is larger than the limit afterwards, it is
   * discarded and a BufferOverflow entry closes the result (or, under the
   * 'fail' policy, BufferOverflowError is thrown carrying the records that
   * completed before it).
   *
   * @throws BufferOverflowError when the limit is exceeded under the 'fail' policy
   */
  ingest(chunk: RawChunk): Array<string | BufferOverflow> {
    const bytes = toBuffer(chunk);
    const records: Array<string | BufferOverflow> = [];

    if (bytes.indexOf(LF) === -1) {
      if (bytes.length > 0) {
        // The caller may reuse its chunk memory
        this.pending.push(typeof chunk === 'string' ? bytes : Buffer.from(bytes));
        this.pendingLength += bytes.length;
      }
    } else {
      const buffer = this.pending.length === 0 ? bytes : Buffer.concat([...this.pending, bytes]);
      this.pending = [];
      this.pendingLength = 0;

      let start = 0;
      let newline = buffer.indexOf(LF, start);
      while (newline !== -1) {
        const end = newline > start && buffer[newline - 1] === CR ? newline - 1 : newline;
        const record = buffer.toString(UTF8_ENCODING, start, end);
        if (record.trim().length > 0) {
          records.push(record);
        }
        start = newline + 1;
        newline = buffer.indexOf(LF, start);
      }

      if (start < buffer.length) {
        // Copy so the consumed prefix of a large chunk can be collected
        const tail = Buffer.from(buffer.subarray(start));
        this.pending.push(tail);
        this.pendingLength = tail.length;
      }
    }

    if (this.pendingLength > this.maxBufferSize) {
      records.push(this.overflow(records));
    }

    return records;
  }

  /**
   * Number of bytes waiting for a newline.
   */
  get pendingBytes(): number {
    return this.pendingLength;
  }

  /**
   * Discard any partial record.
   */
  clear(): void {
    this.pending = [];
    this.pendingLength = 0;
  }

  /**
   * Get current buffer content (useful for debugging).
   */
  getBuffer(): string {
    return Buffer.concat(this.pending).toString(UTF8_ENCODING);
  }

  private overflow(completed: Array<string | BufferOverflow>): BufferOverflow {
    const discardedBytes = this.pendingLength;
    const limit = this.maxBufferSize;
    this.clear();

    const message = BUFFER_OVERFLOW_MESSAGE(discardedBytes, limit);
    this.log.debug(message);

    if (this.overflowPolicy === 'fail') {
      const records = completed.filter((entry): entry is string => typeof entry === 'string');
      throw new BufferOverflowError(message, discardedBytes, limit, records);
    }
    return { kind: 'buffer_overflow', discardedBytes, limit };
  }
}
