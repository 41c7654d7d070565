/**
 * Stream configuration resolution: defaults, environment, overrides.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { loadStreamConfig } from '@/config.js';
import { ConfigError } from '@/utils/errors.js';

void describe('loadStreamConfig', () => {
  void it('falls back to the defaults', () => {
    assert.deepEqual(loadStreamConfig({}), {
      maxBufferBytes: 1048576,
      maxPending: 1000,
      processingRateMs: 1,
      connectTimeoutMs: 10000,
      keepaliveIntervalMs: 30000,
    });
  });

  void it('reads environment variables', () => {
    const config = loadStreamConfig({
      INGEST_MAX_BUFFER_BYTES: '4096',
      INGEST_MAX_PENDING: ' 50 ',
      INGEST_PROCESSING_RATE_MS: '0',
      INGEST_CONNECT_TIMEOUT_MS: '2500',
      INGEST_KEEPALIVE_INTERVAL_MS: '0',
    });

    assert.deepEqual(config, {
      maxBufferBytes: 4096,
      maxPending: 50,
      processingRateMs: 0,
      connectTimeoutMs: 2500,
      keepaliveIntervalMs: 0,
    });
  });

  void it('treats a blank variable as unset', () => {
    assert.equal(loadStreamConfig({ INGEST_MAX_PENDING: '  ' }).maxPending, 1000);
  });

  void it('lets overrides win over the environment', () => {
    const config = loadStreamConfig(
      { INGEST_MAX_PENDING: '50', INGEST_PROCESSING_RATE_MS: '20' },
      { maxPending: 10, processingRateMs: undefined }
    );

    assert.equal(config.maxPending, 10);
    assert.equal(config.processingRateMs, 20);
  });

  void it('rejects malformed environment values', () => {
    assert.throws(
      () => loadStreamConfig({ INGEST_MAX_PENDING: 'abc' }),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message === 'Invalid INGEST_MAX_PENDING: "abc" (expected an integer >= 1)'
    );
    assert.throws(() => loadStreamConfig({ INGEST_CONNECT_TIMEOUT_MS: '1.5' }), ConfigError);
  });

  void it('rejects values below the minimum', () => {
    assert.throws(() => loadStreamConfig({ INGEST_MAX_BUFFER_BYTES: '0' }), {
      message: 'Invalid INGEST_MAX_BUFFER_BYTES: "0" (expected an integer >= 1)',
    });
    assert.throws(() => loadStreamConfig({}, { connectTimeoutMs: 0 }), {
      message: 'Invalid connectTimeoutMs: 0 (expected an integer >= 1)',
    });
    assert.throws(() => loadStreamConfig({}, { processingRateMs: -1 }), {
      message: 'Invalid processingRateMs: -1 (expected an integer >= 0)',
    });
  });

  void it('maps to the invalid-arguments exit code', () => {
    try {
      loadStreamConfig({}, { maxPending: 2.5 });
      assert.fail('expected ConfigError');
    } catch (error) {
      assert.ok(error instanceof ConfigError);
      assert.equal(error.exitCode, 81);
    }
  });
});
