import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { isRecord, isStreamMessage, requireKeys } from '@/pipeline/schema.js';

void describe('isRecord', () => {
  void it('accepts plain objects only', () => {
    assert.equal(isRecord({ a: 1 }), true);
    assert.equal(isRecord({}), true);
    assert.equal(isRecord([1, 2]), false);
    assert.equal(isRecord(null), false);
    assert.equal(isRecord('text'), false);
    assert.equal(isRecord(42), false);
  });
});

void describe('isStreamMessage', () => {
  void it('accepts notifications, replies and arbitrary objects', () => {
    assert.equal(isStreamMessage({ method: 'session.output', params: { text: 'hi' } }), true);
    assert.equal(isStreamMessage({ id: 7, result: null }), true);
    assert.equal(isStreamMessage({ id: 'req-1', error: { code: -32000, message: 'boom' } }), true);
    assert.equal(isStreamMessage({ anything: true }), true);
  });

  void it('rejects well-known fields with the wrong type', () => {
    assert.equal(isStreamMessage({ id: true }), false);
    assert.equal(isStreamMessage({ method: 12 }), false);
    assert.equal(isStreamMessage({ id: 1, error: 'boom' }), false);
    assert.equal(isStreamMessage({ id: 1, error: { code: '1', message: 'boom' } }), false);
  });

  void it('rejects non-objects', () => {
    assert.equal(isStreamMessage('text'), false);
    assert.equal(isStreamMessage([{ id: 1 }]), false);
    assert.equal(isStreamMessage(null), false);
  });
});

void describe('requireKeys', () => {
  void it('requires every named key', () => {
    const schema = requireKeys('type', 'payload');

    assert.equal(schema({ type: 'tick', payload: 1 }), true);
    assert.equal(schema({ type: 'tick', payload: undefined, extra: 2 }), true);
    assert.equal(schema({ type: 'tick' }), false);
    assert.equal(schema([]), false);
  });
});
