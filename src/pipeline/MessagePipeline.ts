/**
 * Line framing followed by decoding.
 *
 * Both transports feed their raw payloads through one pipeline per
 * connection, so a record parses the same way whichever transport carried it.
 */

import { BufferOverflowError } from '@/pipeline/errors.js';
import { JsonlDecoder, type JsonlDecoderOptions } from '@/pipeline/JsonlDecoder.js';
import {
  LineAccumulator,
  type LineAccumulatorOptions,
  toBuffer,
} from '@/pipeline/LineAccumulator.js';
import type { BufferOverflow, PipelineItem, RawChunk } from '@/pipeline/types.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';

export interface MessagePipelineOptions<T> extends LineAccumulatorOptions, JsonlDecoderOptions<T> {}

/**
 * Running totals for one pipeline.
 */
export interface PipelineStats {
  bytes: number;
  records: number;
  decoded: number;
  failures: number;
  overflows: number;
}

export class MessagePipeline<T> {
  private readonly accumulator: LineAccumulator;
  private readonly decoder: JsonlDecoder<T>;
  private readonly counters: PipelineStats = {
    bytes: 0,
    records: 0,
    decoded: 0,
    failures: 0,
    overflows: 0,
  };

  constructor(options: MessagePipelineOptions<T>, log: Logger = createLogger('pipeline')) {
    this.accumulator = new LineAccumulator(options, log);
    this.decoder = new JsonlDecoder(options, log);
  }

  /**
   * Frame and decode one chunk.
   *
   * Returns messages, decode failures and overflow reports in the order
   * their records completed.
   *
   * @throws BufferOverflowError under the 'fail' overflow policy
   */
  process(chunk: RawChunk): Array<PipelineItem<T>> {
    const items: Array<PipelineItem<T>> = [];
    this.feed(chunk, (item) => items.push(item));
    return items;
  }

  /**
   * Frame and decode one chunk, handing each item to `sink` as it completes.
   *
   * Under the 'fail' overflow policy, records the chunk completed before the
   * overflow reach `sink` before BufferOverflowError is thrown.
   */
  feed(chunk: RawChunk, sink: (item: PipelineItem<T>) => void): void {
    const bytes = toBuffer(chunk);
    this.counters.bytes += bytes.length;

    let entries: ReadonlyArray<string | BufferOverflow>;
    let overflow: BufferOverflowError | undefined;
    try {
      entries = this.accumulator.ingest(bytes);
    } catch (error) {
      if (!(error instanceof BufferOverflowError)) {
        throw error;
      }
      entries = error.records;
      overflow = error;
    }

    for (const entry of entries) {
      if (typeof entry !== 'string') {
        this.counters.overflows++;
        sink(entry);
        continue;
      }

      this.counters.records++;
      const decoded = this.decoder.decode(entry);
      if (decoded.kind === 'message') {
        this.counters.decoded++;
      } else {
        this.counters.failures++;
      }
      sink(decoded);
    }

    if (overflow) {
      this.counters.overflows++;
      throw overflow;
    }
  }

  /**
   * Bytes of a partial record waiting for its newline.
   */
  get pendingBytes(): number {
    return this.accumulator.pendingBytes;
  }

  /**
   * Drop any partial record.
   */
  reset(): void {
    this.accumulator.clear();
  }

  stats(): PipelineStats {
    return { ...this.counters };
  }
}
