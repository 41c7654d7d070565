import {
  EventStreamTransport,
  type EventStreamTransportOptions,
} from '@/transport/EventStreamTransport.js';
import { SocketTransport, type SocketTransportOptions } from '@/transport/SocketTransport.js';
import type { TransportClient, TransportKind } from '@/transport/types.js';
import { detectTransportKind } from '@/utils/url.js';

export type TransportSelection = TransportKind | 'auto';

/**
 * Options accepted by either transport; each one ignores the other's extras.
 */
export type AnyTransportOptions<T> = SocketTransportOptions<T> & EventStreamTransportOptions<T>;

/**
 * Build a transport for an endpoint.
 *
 * With 'auto', ws:// and wss:// select the socket transport and
 * http:// and https:// the event-stream transport.
 *
 * @throws InvalidEndpointError when 'auto' cannot classify the endpoint
 */
export function createTransport<T>(
  selection: TransportSelection,
  endpoint: string,
  options: AnyTransportOptions<T>
): TransportClient<T> {
  const kind = selection === 'auto' ? detectTransportKind(endpoint) : selection;
  switch (kind) {
    case 'socket':
      return new SocketTransport<T>(options);
    case 'event-stream':
      return new EventStreamTransport<T>(options);
  }
}
