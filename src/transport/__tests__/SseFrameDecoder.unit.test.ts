/**
 * Unit tests for SseFrameDecoder
 *
 * Tests the contract: text/event-stream bytes in, dispatched events out,
 * independent of how the bytes are chunked.
 */

import * as assert from 'node:assert/strict';
import { beforeEach, describe, it } from 'node:test';

import { SseFrameDecoder } from '@/transport/SseFrameDecoder.js';
import { createLogger } from '@/ui/logging/index.js';

const mockLogger = createLogger('sse');

void describe('SseFrameDecoder', () => {
  let decoder: SseFrameDecoder;

  beforeEach(() => {
    decoder = new SseFrameDecoder(1024, mockLogger);
  });

  void describe('fields', () => {
    void it('dispatches a data event on a blank line', () => {
      assert.deepEqual(decoder.push('data: {"id":1}\n\n'), [
        { event: 'message', data: '{"id":1}', id: undefined },
      ]);
    });

    void it('joins multiple data lines with newlines', () => {
      assert.deepEqual(decoder.push('data: {"id":1}\ndata: {"id":2}\n\n'), [
        { event: 'message', data: '{"id":1}\n{"id":2}', id: undefined },
      ]);
    });

    void it('keeps the event type and id', () => {
      const events = decoder.push('event: update\nid: 42\ndata: x\n\n');

      assert.deepEqual(events, [{ event: 'update', data: 'x', id: '42' }]);
      assert.equal(decoder.lastEventId, '42');
    });

    void it('carries the last id forward to later events', () => {
      const events = decoder.push('id: 7\ndata: a\n\ndata: b\n\n');

      assert.deepEqual(
        events.map((event) => event.id),
        ['7', '7']
      );
    });

    void it('removes only one leading space from a value', () => {
      assert.deepEqual(decoder.push('data:  padded\ndata:tight\n\n'), [
        { event: 'message', data: ' padded\ntight', id: undefined },
      ]);
    });

    void it('ignores comments, unknown fields and empty events', () => {
      const events = decoder.push(': keepalive\n\nfoo: bar\ndata: y\n\n');

      assert.deepEqual(events, [{ event: 'message', data: 'y', id: undefined }]);
    });

    void it('records a numeric retry hint and ignores others', () => {
      decoder.push('retry: 3000\n\n');
      assert.equal(decoder.retryMs, 3000);

      decoder.push('retry: soon\n\n');
      assert.equal(decoder.retryMs, 3000);
    });

    void it('ignores an id containing NUL', () => {
      decoder.push('id: 1\ndata: a\n\n');
      decoder.push('id: 2\0\ndata: b\n\n');

      assert.equal(decoder.lastEventId, '1');
    });
  });

  void describe('line endings and chunking', () => {
    void it('accepts CRLF and lone CR line endings', () => {
      assert.deepEqual(decoder.push('data: a\r\n\r\ndata: b\r\r'), [
        { event: 'message', data: 'a', id: undefined },
        { event: 'message', data: 'b', id: undefined },
      ]);
    });

    void it('treats a CRLF split across chunks as one line ending', () => {
      assert.deepEqual(decoder.push('data: a\r'), []);
      assert.deepEqual(decoder.push('\n\r\n'), [{ event: 'message', data: 'a', id: undefined }]);
    });

    void it('reassembles fields and UTF-8 sequences split across chunks', () => {
      const bytes = new TextEncoder().encode('data: {"name":"café"}\n\n');
      const cut = bytes.indexOf(0xc3) + 1;

      assert.deepEqual(decoder.push(bytes.subarray(0, cut)), []);
      assert.deepEqual(decoder.push(bytes.subarray(cut)), [
        { event: 'message', data: '{"name":"café"}', id: undefined },
      ]);
    });

    void it('discards an over-long line together with its event', () => {
      const small = new SseFrameDecoder(8, mockLogger);

      assert.deepEqual(small.push('data: a\ndata: 0123456789'), []);
      assert.deepEqual(small.push('\n\ndata: ok\n\n'), [
        { event: 'message', data: 'ok', id: undefined },
      ]);
    });

    void it('reset() forgets the partial event but keeps the last id', () => {
      decoder.push('id: 9\ndata: a\n\ndata: partial\n');
      decoder.reset();

      assert.deepEqual(decoder.push('\n'), []);
      assert.equal(decoder.lastEventId, '9');
    });

    void it('reset() drops an incomplete UTF-8 sequence', () => {
      decoder.push(Buffer.concat([Buffer.from('data: '), Uint8Array.of(0xc3)]));
      decoder.reset();

      assert.deepEqual(decoder.push(Buffer.from('data: {"id":1}\n\n')), [
        { event: 'message', data: '{"id":1}', id: undefined },
      ]);
    });
  });
});
