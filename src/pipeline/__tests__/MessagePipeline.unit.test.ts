/**
 * Unit tests for MessagePipeline
 *
 * Tests the contract: framing plus decoding yields items in record order,
 * with identical results however the bytes are chunked.
 */

import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { BufferOverflowError } from '@/pipeline/errors.js';
import { MessagePipeline } from '@/pipeline/MessagePipeline.js';
import { isStreamMessage } from '@/pipeline/schema.js';
import type { PipelineItem } from '@/pipeline/types.js';
import type { StreamMessage } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';

const mockLogger = createLogger('pipeline');

function createPipeline(
  options: { maxBufferSize?: number; overflowPolicy?: 'reset' | 'fail' } = {}
): MessagePipeline<StreamMessage> {
  return new MessagePipeline({ schema: isStreamMessage, now: () => 5, ...options }, mockLogger);
}

function kinds(items: Array<PipelineItem<StreamMessage>>): string[] {
  return items.map((item) => item.kind);
}

function payloads(items: Array<PipelineItem<StreamMessage>>): StreamMessage[] {
  return items.flatMap((item) => (item.kind === 'message' ? [item.data] : []));
}

void describe('MessagePipeline', () => {
  void it('returns messages and failures in record order', () => {
    const pipeline = createPipeline();

    const items = pipeline.process('{"id":1}\nnot json\n{"id":2}\n');

    assert.deepEqual(kinds(items), ['message', 'decode_failure', 'message']);
    assert.deepEqual(payloads(items), [{ id: 1 }, { id: 2 }]);
  });

  void it('keeps decoding after a malformed record', () => {
    const pipeline = createPipeline();

    pipeline.process('{"broken":\n');
    const items = pipeline.process('{"id":7}\n');

    assert.deepEqual(items, [{ kind: 'message', data: { id: 7 }, receivedAt: 5, sequence: 1 }]);
  });

  void it('produces the same messages regardless of chunk boundaries', () => {
    const input = Buffer.from('{"id":1,"text":"naïve"}\n{"id":2}\r\n\n{"id":3,"n":[1,2]}\n');
    const whole = payloads(createPipeline().process(input));

    for (const size of [1, 2, 3, 7, 16]) {
      const pipeline = createPipeline();
      const items: Array<PipelineItem<StreamMessage>> = [];
      for (let offset = 0; offset < input.length; offset += size) {
        items.push(...pipeline.process(input.subarray(offset, offset + size)));
      }
      assert.deepEqual(payloads(items), whole, `chunk size ${size}`);
    }
    assert.equal(whole.length, 3);
  });

  void it('tracks running totals', () => {
    const pipeline = createPipeline({ maxBufferSize: 16 });

    pipeline.process('{"id":1}\nnope\n');
    pipeline.process('x'.repeat(20));

    assert.deepEqual(pipeline.stats(), {
      bytes: 34,
      records: 2,
      decoded: 1,
      failures: 1,
      overflows: 1,
    });
  });

  void it('reports overflow as an item under the reset policy', () => {
    const pipeline = createPipeline({ maxBufferSize: 4 });

    const items = pipeline.process('{"id":1}\n12345');

    assert.deepEqual(kinds(items), ['message', 'buffer_overflow']);
    assert.deepEqual(items[1], { kind: 'buffer_overflow', discardedBytes: 5, limit: 4 });
  });

  void it('throws BufferOverflowError under the fail policy', () => {
    const pipeline = createPipeline({ maxBufferSize: 4, overflowPolicy: 'fail' });

    assert.throws(() => pipeline.process('12345'), BufferOverflowError);
  });

  void it('hands records completed before an overflow to the sink before failing', () => {
    const pipeline = createPipeline({ maxBufferSize: 16, overflowPolicy: 'fail' });
    const items: Array<PipelineItem<StreamMessage>> = [];

    assert.throws(
      () => pipeline.feed('{"id":1}\n' + 'x'.repeat(20), (item) => items.push(item)),
      BufferOverflowError
    );

    assert.deepEqual(payloads(items), [{ id: 1 }]);
    assert.equal(pipeline.pendingBytes, 0);
    assert.deepEqual(pipeline.stats(), {
      bytes: 29,
      records: 1,
      decoded: 1,
      failures: 0,
      overflows: 1,
    });
  });

  void it('decodes a record split across chunks with an empty chunk at the end', () => {
    const pipeline = createPipeline();
    const items: Array<PipelineItem<StreamMessage>> = [];

    for (const chunk of ['{"id":1}\n{"id":2', '}\n{"id":3}\n', '']) {
      items.push(...pipeline.process(chunk));
    }

    assert.deepEqual(payloads(items), [{ id: 1 }, { id: 2 }, { id: 3 }]);
    assert.deepEqual(kinds(items), ['message', 'message', 'message']);
    assert.equal(pipeline.stats().failures, 0);
    assert.equal(pipeline.pendingBytes, 0);
  });

  void it('reset() drops the partial record', () => {
    const pipeline = createPipeline();
    pipeline.process('{"id":');
    assert.equal(pipeline.pendingBytes, 6);

    pipeline.reset();

    assert.equal(pipeline.pendingBytes, 0);
    assert.deepEqual(payloads(pipeline.process('{"id":9}\n')), [{ id: 9 }]);
  });
});
