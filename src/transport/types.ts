/**
 * Transport contracts shared by the event-stream and socket variants.
 */

import type { MetricsRecorder } from '@/metrics/StreamMetricsCollector.js';
import type {
  BufferOverflow,
  DecodedMessage,
  DecodeFailure,
  MessageSchema,
  OverflowPolicy,
} from '@/pipeline/types.js';

/**
 * Connection lifecycle, owned by exactly one transport.
 */
export type ConnectionState =
  | { readonly status: 'disconnected' }
  | { readonly status: 'connecting' }
  | { readonly status: 'connected' }
  | { readonly status: 'disconnecting' }
  | { readonly status: 'failed'; readonly reason: Error };

export type ConnectionStatus = ConnectionState['status'];

export type StateListener = (state: ConnectionState, previous: ConnectionState) => void;

export type TransportKind = 'event-stream' | 'socket';

/**
 * What to do with a decoded message when the queue is full.
 *
 * - 'drop': discard it and emit a 'dropped' diagnostic
 * - 'fail': fail the connection with CapacityExceededError
 */
export type SheddingPolicy = 'drop' | 'fail';

/**
 * A decoded message discarded because the consumer fell behind.
 */
export interface DroppedMessage {
  readonly kind: 'dropped';
  readonly sequence: number;
  readonly queueSize: number;
}

export type TransportDiagnostic = DecodeFailure | BufferOverflow | DroppedMessage;

export type DiagnosticListener = (diagnostic: TransportDiagnostic) => void;

export interface TransportOptions<T> {
  /** Structural check for every decoded record */
  schema: MessageSchema<T>;
  /** Line buffer limit in bytes (default: 1 MiB) */
  maxBufferBytes?: number;
  /** Line buffer overflow behaviour (default: 'reset') */
  overflowPolicy?: OverflowPolicy;
  /** Largest single record in bytes (default: 1 MiB) */
  maxMessageBytes?: number;
  /** Queue capacity (default: 1000) */
  maxPending?: number;
  /** Minimum milliseconds between consumer dequeues (default: 1) */
  processingRateMs?: number;
  /** Full-queue behaviour (default: 'drop') */
  sheddingPolicy?: SheddingPolicy;
  /** Handshake window in milliseconds (default: 10000) */
  connectTimeoutMs?: number;
  /** Receives counts and timings from every stage */
  metrics?: MetricsRecorder;
}

/**
 * Uniform contract over both transports.
 *
 * One logical stream per instance. A new `connect` starts a fresh session
 * with an empty line buffer and queue.
 */
export interface TransportClient<T> {
  readonly kind: TransportKind;

  /** Read-only view of the connection state */
  readonly state: ConnectionState;

  /**
   * @returns Unsubscribe function
   */
  onStateChange(listener: StateListener): () => void;

  /**
   * @returns Unsubscribe function
   */
  onDiagnostic(listener: DiagnosticListener): () => void;

  /**
   * Open the transport. Resolves once messages can flow.
   *
   * @throws StreamConnectionError on handshake failure or when aborted by disconnect()
   * @throws StreamTimeoutError when the connect window elapses
   * @throws InvalidEndpointError for an unusable endpoint
   */
  connect(endpoint: string): Promise<void>;

  /**
   * Encode and send one request.
   *
   * @throws StreamConnectionError when not connected
   */
  send(request: unknown): Promise<void>;

  /**
   * Messages of the current connection, in arrival order.
   *
   * Ends on disconnect() or a clean remote close; throws the failure reason
   * after queued messages are drained when the connection fails.
   */
  receiveStream(): AsyncGenerator<DecodedMessage<T>, void, undefined>;

  /**
   * Close the transport. Idempotent; always ends in 'disconnected'.
   */
  disconnect(): Promise<void>;
}
