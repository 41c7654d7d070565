/**
 * Shared session handling for both transports.
 *
 * A subclass only knows how to open, feed, write to and release its wire.
 * Everything between the raw bytes and the consumer lives here: the state
 * machine, the per-connection pipeline and queue, load shedding,
 * diagnostics and metrics.
 */

import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_MAX_BUFFER_BYTES,
  DEFAULT_MAX_MESSAGE_BYTES,
  DEFAULT_MAX_PENDING,
  DEFAULT_PROCESSING_RATE_MS,
} from '@/constants.js';
import type { MetricsRecorder } from '@/metrics/StreamMetricsCollector.js';
import { MessagePipeline } from '@/pipeline/MessagePipeline.js';
import type { DecodedMessage, OverflowPolicy, PipelineItem, RawChunk } from '@/pipeline/types.js';
import { BackpressureQueue } from '@/queue/BackpressureQueue.js';
import { CapacityExceededError } from '@/queue/errors.js';
import { ConnectionStateMachine } from '@/transport/ConnectionStateMachine.js';
import {
  StreamConnectionError,
  StreamConsumerError,
  StreamRequestError,
  StreamTimeoutError,
} from '@/transport/errors.js';
import type {
  ConnectionState,
  DiagnosticListener,
  SheddingPolicy,
  StateListener,
  TransportClient,
  TransportDiagnostic,
  TransportKind,
  TransportOptions,
} from '@/transport/types.js';
import type { Logger } from '@/ui/logging/index.js';
import { getErrorMessage, StreamError, toError } from '@/utils/errors.js';

// Error Messages
const NOT_CONNECTED_ERROR = 'Not connected';
const CONNECT_ABORTED_ERROR = 'Connect aborted by disconnect()';
const CONSUMER_CONFLICT_ERROR = 'receiveStream() already has a consumer for this connection';
const NO_SESSION_ERROR = 'No connection has been opened';

// Message Templates
const ALREADY_ACTIVE_ERROR = (status: string): string =>
  `Cannot connect while ${status}; call disconnect() first`;
const CONNECTION_TIMEOUT_ERROR = (timeoutMs: number): string =>
  `Connection timeout after ${timeoutMs}ms`;
const CONNECT_FAILED_ERROR = (endpoint: string, errorMsg: string): string =>
  `Failed to connect to ${endpoint}: ${errorMsg}`;
const REQUEST_ENCODE_ERROR = (errorMsg: string): string =>
  `Request could not be encoded as JSON: ${errorMsg}`;
const CONNECTION_FAILED_MESSAGE = (errorMsg: string): string => `Connection failed: ${errorMsg}`;
const MESSAGE_DROPPED_MESSAGE = (sequence: number, size: number): string =>
  `Queue full (${size} pending), dropped message #${sequence}`;

interface Session<T> {
  readonly id: number;
  readonly pipeline: MessagePipeline<T>;
  readonly queue: BackpressureQueue<DecodedMessage<T>>;
  consumerClaimed: boolean;
  failure: Error | null;
}

interface TransportSettings {
  maxBufferBytes: number;
  overflowPolicy: OverflowPolicy;
  maxMessageBytes: number;
  maxPending: number;
  processingRateMs: number;
  sheddingPolicy: SheddingPolicy;
  connectTimeoutMs: number;
}

export abstract class BaseTransport<T> implements TransportClient<T> {
  abstract readonly kind: TransportKind;

  protected readonly metrics: MetricsRecorder | undefined;
  private readonly settings: TransportSettings;
  private readonly machine: ConnectionStateMachine;
  private readonly diagnosticListeners = new Set<DiagnosticListener>();
  private session: Session<T> | null = null;
  private sessionCount = 0;
  private connectAbort: AbortController | null = null;
  private connectSettled: Promise<void> = Promise.resolve();

  protected constructor(
    private readonly options: TransportOptions<T>,
    protected readonly log: Logger
  ) {
    this.metrics = options.metrics;
    this.machine = new ConnectionStateMachine(log);
    this.settings = {
      maxBufferBytes: options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES,
      overflowPolicy: options.overflowPolicy ?? 'reset',
      maxMessageBytes: options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES,
      maxPending: options.maxPending ?? DEFAULT_MAX_PENDING,
      processingRateMs: options.processingRateMs ?? DEFAULT_PROCESSING_RATE_MS,
      sheddingPolicy: options.sheddingPolicy ?? 'drop',
      connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    };
  }

  // ==========================================================================
  // Wire hooks
  // ==========================================================================

  /**
   * Open the wire. Must reject promptly once `signal` aborts.
   */
  protected abstract openConnection(endpoint: string, signal: AbortSignal): Promise<void>;

  /**
   * Detach from and close the wire. Must be idempotent and must not call
   * back into handleRemoteClose() or handleFailure().
   *
   * @param graceful - Close politely (true) or tear down at once (false)
   */
  protected abstract releaseTransport(graceful: boolean): void;

  /**
   * Write one encoded request.
   */
  protected abstract transmit(payload: string): Promise<void>;

  /**
   * Called once the state is 'connected'.
   */
  protected onConnected(): void {
    this.log.debug(`Session #${this.sessionCount} ready`);
  }

  // ==========================================================================
  // Public contract
  // ==========================================================================

  get state(): ConnectionState {
    return this.machine.state;
  }

  onStateChange(listener: StateListener): () => void {
    return this.machine.onChange(listener);
  }

  onDiagnostic(listener: DiagnosticListener): () => void {
    this.diagnosticListeners.add(listener);
    return () => {
      this.diagnosticListeners.delete(listener);
    };
  }

  async connect(endpoint: string): Promise<void> {
    const status = this.machine.status;
    if (status !== 'disconnected' && status !== 'failed') {
      throw new StreamConnectionError(ALREADY_ACTIVE_ERROR(status));
    }

    this.machine.transition({ status: 'connecting' });
    const session = this.createSession();
    this.session = session;

    const controller = new AbortController();
    this.connectAbort = controller;
    let settle: () => void = () => undefined;
    this.connectSettled = new Promise<void>((resolve) => {
      settle = resolve;
    });

    const timeoutMs = this.settings.connectTimeoutMs;
    const timer = setTimeout(() => {
      controller.abort(new StreamTimeoutError(CONNECTION_TIMEOUT_ERROR(timeoutMs)));
    }, timeoutMs);

    try {
      await this.openConnection(endpoint, controller.signal);
      if (controller.signal.aborted) {
        throw toError(controller.signal.reason);
      }
      this.machine.transition({ status: 'connected' });
      this.onConnected();
    } catch (error) {
      this.releaseTransport(false);
      const reason = controller.signal.aborted ? toError(controller.signal.reason) : toError(error);

      if (this.machine.status === 'disconnecting') {
        this.endSession(session, true);
        this.machine.transition({ status: 'disconnected' });
        throw reason;
      }

      const failure =
        reason instanceof StreamError
          ? reason
          : new StreamConnectionError(CONNECT_FAILED_ERROR(endpoint, reason.message), reason);
      session.failure = failure;
      this.endSession(session, false);
      this.machine.transition({ status: 'failed', reason: failure });
      throw failure;
    } finally {
      clearTimeout(timer);
      this.connectAbort = null;
      settle();
    }
  }

  async send(request: unknown): Promise<void> {
    if (this.machine.status !== 'connected') {
      throw new StreamConnectionError(NOT_CONNECTED_ERROR);
    }

    let payload: string;
    try {
      payload = JSON.stringify(request);
    } catch (error) {
      throw new StreamRequestError(
        REQUEST_ENCODE_ERROR(getErrorMessage(error)),
        undefined,
        toError(error)
      );
    }

    this.log.debug(`Sending request (${payload.length} chars)`);
    await this.transmit(payload);
  }

  async *receiveStream(): AsyncGenerator<DecodedMessage<T>, void, undefined> {
    const session = this.session;
    if (!session) {
      throw new StreamConnectionError(NO_SESSION_ERROR);
    }
    if (session.consumerClaimed) {
      throw new StreamConsumerError(CONSUMER_CONFLICT_ERROR);
    }
    session.consumerClaimed = true;

    for (;;) {
      const message = await session.queue.dequeue();
      if (message === undefined) {
        break;
      }
      this.metrics?.recordConsumed(Date.now() - message.receivedAt);
      this.metrics?.observeQueue(session.queue.size, session.queue.capacity);
      yield message;
    }

    if (session.failure) {
      throw session.failure;
    }
  }

  async disconnect(): Promise<void> {
    const session = this.session;

    switch (this.machine.status) {
      case 'disconnected':
        return;

      case 'connecting':
        this.machine.transition({ status: 'disconnecting' });
        this.connectAbort?.abort(new StreamConnectionError(CONNECT_ABORTED_ERROR));
        await this.connectSettled;
        return;

      case 'disconnecting':
        await this.connectSettled;
        return;

      case 'connected':
        this.machine.transition({ status: 'disconnecting' });
        this.releaseTransport(true);
        if (session) {
          this.endSession(session, true);
        }
        this.machine.transition({ status: 'disconnected' });
        return;

      case 'failed':
        if (session) {
          this.endSession(session, true);
        }
        this.machine.transition({ status: 'disconnected' });
        return;
    }
  }

  // ==========================================================================
  // Subclass helpers
  // ==========================================================================

  /**
   * Feed raw bytes from the wire into the current session.
   */
  protected ingest(chunk: RawChunk): void {
    const session = this.session;
    if (!session || session.queue.isClosed) {
      return;
    }

    this.metrics?.recordReceived(
      typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.byteLength
    );

    // Records completed before an overflow under the 'fail' policy are
    // queued first, then the failure ends the session behind them
    try {
      session.pipeline.feed(chunk, (item) => {
        if (!session.queue.isClosed) {
          this.dispatch(session, item);
        }
      });
    } catch (error) {
      this.handleFailure(toError(error));
      return;
    }

    this.metrics?.observeQueue(session.queue.size, session.queue.capacity);
  }

  /**
   * The peer ended the stream cleanly. Queued messages stay available to
   * the consumer, then the receive sequence ends normally.
   */
  protected handleRemoteClose(): void {
    const session = this.session;
    if (this.machine.status !== 'connected' || !session) {
      return;
    }

    this.log.debug('Remote end closed the stream');
    this.releaseTransport(true);
    this.endSession(session, false);
    this.machine.transition({ status: 'disconnected' });
  }

  /**
   * The connection broke. Queued messages stay available to the consumer,
   * after which the receive sequence throws `error`.
   */
  protected handleFailure(error: Error): void {
    const session = this.session;

    if (this.machine.status === 'connecting') {
      this.connectAbort?.abort(error);
      return;
    }
    if (this.machine.status !== 'connected' || !session) {
      this.log.debug(`Ignoring failure while ${this.machine.status}: ${error.message}`);
      return;
    }

    this.log.info(CONNECTION_FAILED_MESSAGE(error.message));
    this.releaseTransport(false);
    session.failure = error;
    this.endSession(session, false);
    this.machine.transition({ status: 'failed', reason: error });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private createSession(): Session<T> {
    this.sessionCount++;
    return {
      id: this.sessionCount,
      pipeline: new MessagePipeline<T>(
        {
          schema: this.options.schema,
          maxBufferSize: this.settings.maxBufferBytes,
          overflowPolicy: this.settings.overflowPolicy,
          maxMessageBytes: this.settings.maxMessageBytes,
        },
        this.log
      ),
      queue: new BackpressureQueue<DecodedMessage<T>>({
        maxPending: this.settings.maxPending,
        processingRateMs: this.settings.processingRateMs,
      }),
      consumerClaimed: false,
      failure: null,
    };
  }

  private endSession(session: Session<T>, discard: boolean): void {
    if (discard) {
      const discarded = session.queue.clear();
      if (discarded > 0) {
        this.log.debug(`Session #${session.id}: discarded ${discarded} undelivered messages`);
      }
    }
    session.queue.close();
    this.metrics?.observeQueue(session.queue.size, session.queue.capacity);
  }

  private dispatch(session: Session<T>, item: PipelineItem<T>): void {
    switch (item.kind) {
      case 'message':
        this.metrics?.recordDecoded();
        this.deliver(session, item);
        break;
      case 'decode_failure':
        this.metrics?.recordDecodeFailure();
        this.emitDiagnostic(item);
        break;
      case 'buffer_overflow':
        this.metrics?.recordOverflow();
        this.log.info(
          `Line buffer overflow: discarded ${item.discardedBytes} bytes (limit ${item.limit})`
        );
        this.emitDiagnostic(item);
        break;
    }
  }

  private deliver(session: Session<T>, message: DecodedMessage<T>): void {
    try {
      session.queue.enqueue(message);
    } catch (error) {
      if (!(error instanceof CapacityExceededError)) {
        throw error;
      }
      if (this.settings.sheddingPolicy === 'fail') {
        this.handleFailure(error);
        return;
      }

      this.log.debug(MESSAGE_DROPPED_MESSAGE(message.sequence, session.queue.size));
      this.metrics?.recordDropped();
      this.emitDiagnostic({
        kind: 'dropped',
        sequence: message.sequence,
        queueSize: session.queue.size,
      });
    }
  }

  private emitDiagnostic(diagnostic: TransportDiagnostic): void {
    this.diagnosticListeners.forEach((listener) => listener(diagnostic));
  }
}
