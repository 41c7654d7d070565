/**
 * Endpoint URL helpers.
 *
 * Both transports accept http(s) and ws(s) endpoints and convert the
 * scheme to the one their wire needs.
 */

import { InvalidEndpointError } from '@/transport/errors.js';
import type { TransportKind } from '@/transport/types.js';

const SOCKET_SCHEMES: Record<string, string> = {
  'http:': 'ws:',
  'https:': 'wss:',
  'ws:': 'ws:',
  'wss:': 'wss:',
};

const HTTP_SCHEMES: Record<string, string> = {
  'http:': 'http:',
  'https:': 'https:',
  'ws:': 'http:',
  'wss:': 'https:',
};

const INVALID_URL_ERROR = (input: string): string => `Invalid endpoint URL: ${input}`;
const UNSUPPORTED_SCHEME_ERROR = (protocol: string): string =>
  `Unsupported endpoint scheme "${protocol}" (expected http, https, ws or wss)`;

/**
 * Safely parse a URL string.
 *
 * @returns Parsed URL object, or null if parsing fails
 *
 * @example
 * ```typescript
 * safeParseUrl('https://example.com/stream') // → URL { ... }
 * safeParseUrl('not a url')                  // → null
 * ```
 */
export function safeParseUrl(input: string): URL | null {
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

function convertScheme(input: string, schemes: Record<string, string>): string {
  const url = safeParseUrl(input);
  if (!url) {
    throw new InvalidEndpointError(INVALID_URL_ERROR(input));
  }

  const protocol = schemes[url.protocol];
  if (!protocol) {
    throw new InvalidEndpointError(UNSUPPORTED_SCHEME_ERROR(url.protocol));
  }

  url.protocol = protocol;
  return url.toString();
}

/**
 * Rewrite an endpoint for a WebSocket connection.
 *
 * @example
 * ```typescript
 * toWebSocketUrl('http://localhost:8080/session') // 'ws://localhost:8080/session'
 * toWebSocketUrl('https://api.example.com/s')     // 'wss://api.example.com/s'
 * ```
 *
 * @throws InvalidEndpointError for malformed URLs or other schemes
 */
export function toWebSocketUrl(input: string): string {
  return convertScheme(input, SOCKET_SCHEMES);
}

/**
 * Rewrite an endpoint for an HTTP (event-stream) connection.
 *
 * @example
 * ```typescript
 * toHttpUrl('ws://localhost:8080/session') // 'http://localhost:8080/session'
 * ```
 *
 * @throws InvalidEndpointError for malformed URLs or other schemes
 */
export function toHttpUrl(input: string): string {
  return convertScheme(input, HTTP_SCHEMES);
}

/**
 * Pick a transport from the endpoint scheme: ws(s) → socket, http(s) → event-stream.
 *
 * @throws InvalidEndpointError for malformed URLs or other schemes
 */
export function detectTransportKind(input: string): TransportKind {
  const url = safeParseUrl(input);
  if (!url) {
    throw new InvalidEndpointError(INVALID_URL_ERROR(input));
  }

  switch (url.protocol) {
    case 'ws:':
    case 'wss:':
      return 'socket';
    case 'http:':
    case 'https:':
      return 'event-stream';
    default:
      throw new InvalidEndpointError(UNSUPPORTED_SCHEME_ERROR(url.protocol));
  }
}
