/**
 * Option and argument validation for the CLI commands.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { Command } from 'commander';

import { integerOption } from '@/commands/shared/commonOptions.js';
import {
  parseInteger,
  parseJsonValue,
  parseOverflowPolicy,
  parseSheddingPolicy,
  parseTransportSelection,
  validateEndpoint,
} from '@/commands/shared/validation.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

function isInvalidArguments(message: string): (error: unknown) => boolean {
  return (error) =>
    error instanceof CommandError &&
    error.exitCode === EXIT_CODES.INVALID_ARGUMENTS &&
    error.message === message;
}

void describe('parseInteger', () => {
  void it('accepts whole numbers within bounds', () => {
    assert.equal(parseInteger('max-pending', '500', { min: 1 }), 500);
    assert.equal(parseInteger('rate', ' 0 ', { min: 0 }), 0);
  });

  void it('rejects values below the minimum', () => {
    assert.throws(
      () => parseInteger('max-pending', '0', { min: 1 }),
      isInvalidArguments(
        'Invalid max-pending: "0" is not a valid integer\nMust be at least 1\n\n' +
          'Example: --max-pending 1'
      )
    );
  });

  void it('rejects non-numeric input with the valid range', () => {
    assert.throws(
      () => parseInteger('retries', 'abc', { min: 0, max: 10 }),
      isInvalidArguments(
        'Invalid retries: "abc" is not a valid integer\nValid range: 0 to 10\n\n' +
          'Example: --retries 0'
      )
    );
    assert.throws(() => parseInteger('limit', '1.5'), CommandError);
  });

  void it('backs commander integer options', () => {
    const program = new Command()
      .exitOverride()
      .addOption(integerOption('--max-pending <n>', 'Queue capacity', { min: 1 }));

    program.parse(['--max-pending', '25'], { from: 'user' });
    assert.equal(program.opts()['maxPending'], 25);

    assert.throws(
      () => program.parse(['--max-pending', '0'], { from: 'user' }),
      (error: unknown) => error instanceof CommandError && error.message.includes('max-pending')
    );
  });
});

void describe('policy and transport parsers', () => {
  void it('maps transport aliases', () => {
    assert.equal(parseTransportSelection('sse'), 'event-stream');
    assert.equal(parseTransportSelection('WS'), 'socket');
    assert.equal(parseTransportSelection('event-stream'), 'event-stream');
    assert.equal(parseTransportSelection('auto'), 'auto');
    assert.throws(
      () => parseTransportSelection('tcp'),
      isInvalidArguments('Unknown transport "tcp"')
    );
  });

  void it('accepts the known policies only', () => {
    assert.equal(parseOverflowPolicy('reset'), 'reset');
    assert.equal(parseOverflowPolicy('fail'), 'fail');
    assert.equal(parseSheddingPolicy('drop'), 'drop');
    assert.throws(
      () => parseOverflowPolicy('grow'),
      isInvalidArguments('Unknown overflow policy "grow"')
    );
    assert.throws(
      () => parseSheddingPolicy('block'),
      isInvalidArguments('Unknown shedding policy "block"')
    );
  });
});

void describe('parseJsonValue', () => {
  void it('parses a JSON request', () => {
    assert.deepEqual(parseJsonValue('send', '{"method":"subscribe"}'), { method: 'subscribe' });
  });

  void it('rejects malformed JSON with a quoting hint', () => {
    assert.throws(
      () => parseJsonValue('send', '{method}'),
      (error: unknown) =>
        error instanceof CommandError &&
        error.message.startsWith('--send must be valid JSON (') &&
        error.metadata.suggestion === `Quote the value: --send '{"method":"subscribe"}'`
    );
  });
});

void describe('validateEndpoint', () => {
  void it('trims and accepts http and ws endpoints', () => {
    assert.equal(validateEndpoint(' ws://localhost:9000/stream '), 'ws://localhost:9000/stream');
    assert.equal(validateEndpoint('https://localhost/events'), 'https://localhost/events');
  });

  void it('rejects other schemes with the invalid URL exit code', () => {
    assert.throws(
      () => validateEndpoint('ftp://localhost/file'),
      (error: unknown) =>
        error instanceof CommandError &&
        error.exitCode === EXIT_CODES.INVALID_URL &&
        error.message === '"ftp://localhost/file" is not an http(s) or ws(s) URL' &&
        error.metadata.note ===
          'Unsupported endpoint scheme "ftp:" (expected http, https, ws or wss)'
    );
  });
});
