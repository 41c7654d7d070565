/**
 * SocketTransport contract tests
 *
 * Tests the public TransportClient contract over WebSocket. FakeWebSocket
 * replaces the network boundary; framing, decoding, queueing and the
 * state machine all run for real.
 *
 * Coverage:
 * 1. Connection lifecycle - handshake, failures, timeout, disconnect
 * 2. Receiving - framing across frames, diagnostics, drain on close
 * 3. Sending - encoding and write failures
 * 4. Keepalive - ping/pong, missed pongs
 * 5. Backpressure - drop and fail shedding, overflow policy
 */

import * as assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import type WebSocket from 'ws';

import { collect, take } from '@/__testutils__/assertions.js';
import { FakeWebSocket } from '@/__testutils__/FakeWebSocket.js';
import { useFakeClock, type ClockHelper } from '@/__testutils__/testClock.js';
import { StreamMetricsCollector } from '@/metrics/StreamMetricsCollector.js';
import { BufferOverflowError } from '@/pipeline/errors.js';
import { isStreamMessage } from '@/pipeline/schema.js';
import { CapacityExceededError } from '@/queue/errors.js';
import {
  InvalidEndpointError,
  StreamConnectionError,
  StreamConsumerError,
  StreamRequestError,
  StreamTimeoutError,
} from '@/transport/errors.js';
import {
  rawDataToBuffer,
  SocketTransport,
  type SocketTransportOptions,
} from '@/transport/SocketTransport.js';
import type { ConnectionStatus, TransportDiagnostic } from '@/transport/types.js';
import type { StreamMessage } from '@/types.js';

const ENDPOINT = 'ws://127.0.0.1:9000/stream';

type TestOptions = Partial<SocketTransportOptions<StreamMessage>>;

void describe('SocketTransport contract', () => {
  let sockets: FakeWebSocket[];
  let transport: SocketTransport<StreamMessage>;

  function currentSocket(): FakeWebSocket {
    const socket = sockets[sockets.length - 1];
    assert.ok(socket, 'Expected a socket to have been created');
    return socket;
  }

  function createSocketTransport(options: TestOptions = {}): SocketTransport<StreamMessage> {
    return new SocketTransport<StreamMessage>({
      schema: isStreamMessage,
      processingRateMs: 0,
      keepaliveIntervalMs: 0,
      createWebSocket: (url) => {
        const socket = new FakeWebSocket(url);
        sockets.push(socket);
        return socket as unknown as WebSocket;
      },
      ...options,
    });
  }

  async function connectAndOpen(endpoint: string = ENDPOINT): Promise<FakeWebSocket> {
    const connecting = transport.connect(endpoint);
    const socket = currentSocket();
    socket.simulateOpen();
    await connecting;
    return socket;
  }

  function ids(messages: Array<{ data: StreamMessage }>): unknown[] {
    return messages.map((message) => message.data.id);
  }

  beforeEach(() => {
    sockets = [];
    transport = createSocketTransport();
  });

  afterEach(async () => {
    await transport.disconnect();
  });

  void describe('Connection lifecycle', () => {
    void it('connects once the socket opens', async () => {
      const statuses: ConnectionStatus[] = [];
      transport.onStateChange((state) => statuses.push(state.status));

      await connectAndOpen();

      assert.equal(transport.state.status, 'connected');
      assert.deepEqual(statuses, ['connecting', 'connected']);
      assert.equal(currentSocket().url, ENDPOINT);
      assert.equal(transport.kind, 'socket');
    });

    void it('rewrites an http endpoint to ws', async () => {
      await connectAndOpen('http://127.0.0.1:9000/stream');

      assert.equal(currentSocket().url, 'ws://127.0.0.1:9000/stream');
    });

    void it('rejects an unusable endpoint with InvalidEndpointError', async () => {
      await assert.rejects(transport.connect('ftp://127.0.0.1/stream'), InvalidEndpointError);

      assert.equal(transport.state.status, 'failed');
      assert.equal(sockets.length, 0);
    });

    void it('fails when the handshake errors', async () => {
      const connecting = transport.connect(ENDPOINT);
      currentSocket().simulateError(new Error('ECONNREFUSED'));

      await assert.rejects(
        connecting,
        (error: unknown) =>
          error instanceof StreamConnectionError &&
          error.message === `Failed to connect to ${ENDPOINT}: ECONNREFUSED`
      );
      const state = transport.state;
      assert.equal(state.status, 'failed');
      assert.equal(
        state.status === 'failed' && state.reason.message,
        `Failed to connect to ${ENDPOINT}: ECONNREFUSED`
      );
      assert.equal(currentSocket().wasTerminated(), true);
    });

    void it('fails when the socket closes during the handshake', async () => {
      const connecting = transport.connect(ENDPOINT);
      currentSocket().simulateClose(1002, 'protocol error');

      await assert.rejects(
        connecting,
        (error: unknown) =>
          error instanceof StreamConnectionError &&
          error.message === 'WebSocket closed during handshake: 1002 - protocol error'
      );
    });

    void it('refuses a second connect while connected', async () => {
      await connectAndOpen();

      await assert.rejects(
        transport.connect(ENDPOINT),
        (error: unknown) =>
          error instanceof StreamConnectionError &&
          error.message === 'Cannot connect while connected; call disconnect() first'
      );
      assert.equal(transport.state.status, 'connected');
    });

    void it('aborts a pending connect on disconnect()', async () => {
      const connecting = transport.connect(ENDPOINT);
      const rejection = assert.rejects(
        connecting,
        (error: unknown) =>
          error instanceof StreamConnectionError &&
          error.message === 'Connect aborted by disconnect()'
      );

      await transport.disconnect();
      await rejection;

      assert.equal(transport.state.status, 'disconnected');
      assert.equal(currentSocket().wasTerminated(), true);
    });

    void it('discards queued messages and closes normally on disconnect()', async () => {
      const socket = await connectAndOpen();
      socket.simulateMessage('{"id":1}\n{"id":2}\n');

      await transport.disconnect();

      assert.equal(transport.state.status, 'disconnected');
      assert.equal(socket.getCloseCode(), 1000);
      assert.equal(socket.getCloseReason(), 'Normal closure');
      assert.deepEqual(await collect(transport.receiveStream()), []);
    });

    void it('treats disconnect() as idempotent', async () => {
      await connectAndOpen();

      await transport.disconnect();
      await transport.disconnect();

      assert.equal(transport.state.status, 'disconnected');
    });

    void it('starts a fresh session on reconnect', async () => {
      const first = await connectAndOpen();
      first.simulateMessage('{"id":');
      first.simulateClose(1006, 'gone');
      assert.equal(transport.state.status, 'failed');

      const second = await connectAndOpen();
      second.simulateMessage('{"id":2}\n');

      const [message] = await take(transport.receiveStream(), 1);
      assert.deepEqual(message?.data, { id: 2 });
      assert.equal(message?.sequence, 1);
    });
  });

  void describe('Receiving', () => {
    void it('yields every record of a frame in order', async () => {
      const socket = await connectAndOpen();
      socket.simulateMessage('{"id":1}\n{"id":2}\n');

      const messages = await take(transport.receiveStream(), 2);

      assert.deepEqual(ids(messages), [1, 2]);
    });

    void it('reassembles a record split across frames', async () => {
      const socket = await connectAndOpen();
      socket.simulateMessage('{"id":');
      socket.simulateMessage(Buffer.from('3,"method":"tick"}\n'));

      const [message] = await take(transport.receiveStream(), 1);

      assert.deepEqual(message?.data, { id: 3, method: 'tick' });
    });

    void it('reports a malformed record and keeps streaming', async () => {
      const diagnostics: TransportDiagnostic[] = [];
      transport.onDiagnostic((diagnostic) => diagnostics.push(diagnostic));
      const socket = await connectAndOpen();

      socket.simulateMessage('oops\n{"id":5}\n');
      const messages = await take(transport.receiveStream(), 1);

      assert.deepEqual(ids(messages), [5]);
      assert.equal(diagnostics.length, 1);
      assert.equal(diagnostics[0]?.kind, 'decode_failure');
      assert.equal(diagnostics[0]?.kind === 'decode_failure' && diagnostics[0].line, 'oops');
    });

    void it('drains queued messages and ends on a clean remote close', async () => {
      const socket = await connectAndOpen();
      socket.simulateMessage('{"id":1}\n{"id":2}\n');

      socket.simulateClose(1000, 'done');

      assert.equal(transport.state.status, 'disconnected');
      assert.deepEqual(ids(await collect(transport.receiveStream())), [1, 2]);
    });

    void it('drains queued messages, then throws on an abnormal close', async () => {
      const socket = await connectAndOpen();
      socket.simulateMessage('{"id":1}\n{"id":2}\n');

      socket.simulateClose(1006, 'gone');

      const received: unknown[] = [];
      await assert.rejects(
        async () => {
          for await (const message of transport.receiveStream()) {
            received.push(message.data.id);
          }
        },
        (error: unknown) =>
          error instanceof StreamConnectionError &&
          error.message === 'WebSocket closed: 1006 - gone'
      );
      assert.deepEqual(received, [1, 2]);
      assert.equal(transport.state.status, 'failed');
    });

    void it('fails the connection on a socket error', async () => {
      const socket = await connectAndOpen();

      socket.simulateError(new Error('read ECONNRESET'));

      await assert.rejects(
        collect(transport.receiveStream()),
        (error: unknown) =>
          error instanceof StreamConnectionError &&
          error.message === 'WebSocket error: read ECONNRESET'
      );
      assert.equal(socket.wasTerminated(), true);
    });

    void it('allows a single consumer per connection', async () => {
      const socket = await connectAndOpen();
      const consumer = transport.receiveStream();
      const pending = consumer.next();

      await assert.rejects(transport.receiveStream().next(), StreamConsumerError);

      socket.simulateMessage('{"id":1}\n');
      const result = await pending;
      assert.deepEqual(result.done === false && result.value.data, { id: 1 });
    });

    void it('feeds the metrics recorder', async () => {
      const metrics = new StreamMetricsCollector();
      transport = createSocketTransport({ metrics });
      const socket = await connectAndOpen();

      socket.simulateMessage('{"id":1}\nbad\n{"id":2}\n');
      await take(transport.receiveStream(), 2);

      const totals = metrics.getTotals();
      assert.equal(totals.bytesReceived, 22);
      assert.equal(totals.messagesDecoded, 2);
      assert.equal(totals.decodeFailures, 1);
      assert.equal(totals.consumed, 2);
    });
  });

  void describe('Sending', () => {
    void it('writes the request as one JSON text frame', async () => {
      const socket = await connectAndOpen();

      await transport.send({ method: 'subscribe', params: { topic: 'logs' } });

      assert.deepEqual(socket.getSentMessages(), [
        '{"method":"subscribe","params":{"topic":"logs"}}',
      ]);
    });

    void it('rejects when not connected', async () => {
      await assert.rejects(
        transport.send({ method: 'subscribe' }),
        (error: unknown) =>
          error instanceof StreamConnectionError && error.message === 'Not connected'
      );
    });

    void it('reports a failed write', async () => {
      const socket = await connectAndOpen();
      socket.failSends(new Error('socket hang up'));

      await assert.rejects(
        transport.send({ method: 'subscribe' }),
        (error: unknown) =>
          error instanceof StreamConnectionError &&
          error.message === 'Failed to send request: socket hang up'
      );
    });

    void it('rejects a request that cannot be encoded', async () => {
      await connectAndOpen();

      await assert.rejects(
        transport.send({ count: BigInt(1) }),
        (error: unknown) =>
          error instanceof StreamRequestError &&
          error.message.startsWith('Request could not be encoded as JSON')
      );
    });
  });

  void describe('Backpressure', () => {
    void it('drops messages beyond maxPending under the drop policy', async () => {
      transport = createSocketTransport({ maxPending: 2 });
      const diagnostics: TransportDiagnostic[] = [];
      transport.onDiagnostic((diagnostic) => diagnostics.push(diagnostic));
      const socket = await connectAndOpen();

      socket.simulateMessage('{"id":1}\n{"id":2}\n{"id":3}\n');
      socket.simulateClose(1000, '');

      assert.deepEqual(diagnostics, [{ kind: 'dropped', sequence: 3, queueSize: 2 }]);
      assert.deepEqual(ids(await collect(transport.receiveStream())), [1, 2]);
    });

    void it('fails the connection when full under the fail policy', async () => {
      transport = createSocketTransport({ maxPending: 1, sheddingPolicy: 'fail' });
      const socket = await connectAndOpen();

      socket.simulateMessage('{"id":1}\n{"id":2}\n');

      assert.equal(transport.state.status, 'failed');
      const received: unknown[] = [];
      await assert.rejects(async () => {
        for await (const message of transport.receiveStream()) {
          received.push(message.data.id);
        }
      }, CapacityExceededError);
      assert.deepEqual(received, [1]);
    });

    void it('fails the connection on overflow under the fail overflow policy', async () => {
      transport = createSocketTransport({ maxBufferBytes: 8, overflowPolicy: 'fail' });
      const socket = await connectAndOpen();

      socket.simulateMessage('0123456789');

      const state = transport.state;
      assert.equal(state.status, 'failed');
      assert.ok(state.status === 'failed' && state.reason instanceof BufferOverflowError);
    });

    void it('delivers records completed before an overflow under the fail policy', async () => {
      transport = createSocketTransport({ maxBufferBytes: 16, overflowPolicy: 'fail' });
      const socket = await connectAndOpen();

      socket.simulateMessage('{"id":1}\n' + 'x'.repeat(20));

      assert.equal(transport.state.status, 'failed');
      const received: unknown[] = [];
      await assert.rejects(async () => {
        for await (const message of transport.receiveStream()) {
          received.push(message.data.id);
        }
      }, BufferOverflowError);
      assert.deepEqual(received, [1]);
    });

    void it('reports overflow and recovers under the reset policy', async () => {
      transport = createSocketTransport({ maxBufferBytes: 8 });
      const diagnostics: TransportDiagnostic[] = [];
      transport.onDiagnostic((diagnostic) => diagnostics.push(diagnostic));
      const socket = await connectAndOpen();

      socket.simulateMessage('0123456789');
      socket.simulateMessage('{"id":1}\n');

      assert.deepEqual(diagnostics, [{ kind: 'buffer_overflow', discardedBytes: 10, limit: 8 }]);
      assert.deepEqual(ids(await take(transport.receiveStream(), 1)), [1]);
    });
  });

  void describe('Timers', () => {
    let clock: ClockHelper;

    beforeEach(() => {
      clock = useFakeClock();
    });

    afterEach(() => {
      clock.restore();
    });

    void it('times out a handshake that never completes', async () => {
      transport = createSocketTransport({ connectTimeoutMs: 5000 });
      const rejection = assert.rejects(
        transport.connect(ENDPOINT),
        (error: unknown) =>
          error instanceof StreamTimeoutError && error.message === 'Connection timeout after 5000ms'
      );

      await clock.advance(4999);
      assert.equal(transport.state.status, 'connecting');

      await clock.advance(1);
      await rejection;
      assert.equal(transport.state.status, 'failed');
      assert.equal(currentSocket().wasTerminated(), true);
    });

    void it('keeps the connection while pongs arrive', async () => {
      transport = createSocketTransport({ keepaliveIntervalMs: 1000, maxMissedPongs: 2 });
      const socket = await connectAndOpen();

      for (let i = 0; i < 5; i++) {
        await clock.advance(1000);
        socket.simulatePong();
      }

      assert.equal(socket.getPingCount(), 5);
      assert.equal(transport.state.status, 'connected');
    });

    void it('fails after maxMissedPongs unanswered pings', async () => {
      transport = createSocketTransport({ keepaliveIntervalMs: 1000, maxMissedPongs: 2 });
      const socket = await connectAndOpen();

      await clock.advance(1000);
      socket.simulatePong();
      await clock.advance(2000);
      assert.equal(transport.state.status, 'connected');
      assert.equal(socket.getPingCount(), 3);

      await clock.advance(1000);

      const state = transport.state;
      assert.equal(state.status, 'failed');
      assert.equal(
        state.status === 'failed' && state.reason.message,
        'Keepalive failed: 2 pings without a pong'
      );
      assert.equal(socket.getCloseCode(), 1001);
      assert.equal(socket.getCloseReason(), 'No pong received');
    });

    void it('stops pinging after disconnect()', async () => {
      transport = createSocketTransport({ keepaliveIntervalMs: 1000 });
      const socket = await connectAndOpen();

      await transport.disconnect();
      await clock.advance(5000);

      assert.equal(socket.getPingCount(), 0);
      assert.equal(clock.clock.pendingTimers, 0);
    });
  });
});

void describe('rawDataToBuffer', () => {
  void it('normalizes every payload shape ws delivers', () => {
    assert.equal(rawDataToBuffer('{"a":1}').toString(), '{"a":1}');
    assert.equal(rawDataToBuffer(Buffer.from('abc')).toString(), 'abc');
    assert.equal(rawDataToBuffer([Buffer.from('ab'), Buffer.from('c')]).toString(), 'abc');

    const arrayBuffer = new ArrayBuffer(3);
    new Uint8Array(arrayBuffer).set([0x78, 0x79, 0x7a]);
    assert.equal(rawDataToBuffer(arrayBuffer).toString(), 'xyz');
  });
});
