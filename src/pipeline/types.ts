/**
 * Value types flowing out of the line-buffering and decoding stages.
 */

/**
 * Typed message produced by the decoder. Frozen at decode time.
 */
export interface DecodedMessage<T> {
  readonly kind: 'message';
  readonly data: T;
  /** Epoch milliseconds at decode time */
  readonly receivedAt: number;
  /** 1-based arrival order within one pipeline */
  readonly sequence: number;
}

/**
 * A record that could not be turned into a message. Reported, never re-queued.
 */
export interface DecodeFailure {
  readonly kind: 'decode_failure';
  readonly line: string;
  readonly diagnostic: string;
  readonly receivedAt: number;
}

/**
 * The line buffer grew past its limit and its contents were discarded.
 */
export interface BufferOverflow {
  readonly kind: 'buffer_overflow';
  readonly discardedBytes: number;
  readonly limit: number;
}

export type PipelineItem<T> = DecodedMessage<T> | DecodeFailure | BufferOverflow;

/**
 * What to do when an unterminated record exceeds the buffer limit.
 *
 * - 'reset': discard the buffer, report a BufferOverflow and keep going
 * - 'fail': discard the buffer and throw BufferOverflowError once the records
 *   completed before the overflow have been delivered
 */
export type OverflowPolicy = 'reset' | 'fail';

/**
 * Structural check applied to every parsed record.
 */
export type MessageSchema<T> = (value: unknown) => value is T;

/**
 * Raw bytes as delivered by a transport. Strings are treated as UTF-8.
 */
export type RawChunk = Buffer | Uint8Array | string;
