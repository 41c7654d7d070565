/**
 * Transport layer.
 */

export { BaseTransport } from './BaseTransport.js';
export { ConnectionStateMachine } from './ConnectionStateMachine.js';
export {
  createTransport,
  type AnyTransportOptions,
  type TransportSelection,
} from './createTransport.js';
export {
  InvalidEndpointError,
  StateTransitionError,
  StreamConnectionError,
  StreamConsumerError,
  StreamRequestError,
  StreamTimeoutError,
} from './errors.js';
export { EventStreamTransport, type EventStreamTransportOptions } from './EventStreamTransport.js';
export {
  SocketTransport,
  rawDataToBuffer,
  type SocketTransportOptions,
  type WebSocketFactory,
} from './SocketTransport.js';
export { SseFrameDecoder, type SseEvent } from './SseFrameDecoder.js';
export {
  StreamSupervisor,
  calculateBackoffDelay,
  isRetryableError,
  type StreamSupervisorOptions,
  type SupervisorStatus,
} from './StreamSupervisor.js';
export type {
  ConnectionState,
  ConnectionStatus,
  DiagnosticListener,
  DroppedMessage,
  SheddingPolicy,
  StateListener,
  TransportClient,
  TransportDiagnostic,
  TransportKind,
  TransportOptions,
} from './types.js';
