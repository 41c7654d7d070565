import WebSocket from 'ws';

import {
  DEFAULT_KEEPALIVE_INTERVAL_MS,
  DEFAULT_MAX_MISSED_PONGS,
  UTF8_ENCODING,
  WEBSOCKET_GOING_AWAY,
  WEBSOCKET_NORMAL_CLOSURE,
} from '@/constants.js';
import { BaseTransport } from '@/transport/BaseTransport.js';
import { StreamConnectionError } from '@/transport/errors.js';
import type { TransportOptions } from '@/transport/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { toError } from '@/utils/errors.js';
import { toWebSocketUrl } from '@/utils/url.js';

// Error Messages
const NOT_OPEN_ERROR = 'WebSocket is not open';
const NORMAL_CLOSURE_REASON = 'Normal closure';
const NO_PONG_RECEIVED_REASON = 'No pong received';

// Message Templates
const HANDSHAKE_CLOSED_ERROR = (code: number, reason: string): string =>
  `WebSocket closed during handshake: ${code}${reason ? ` - ${reason}` : ''}`;
const SOCKET_CLOSED_ERROR = (code: number, reason: string): string =>
  `WebSocket closed: ${code}${reason ? ` - ${reason}` : ''}`;
const SOCKET_ERROR = (errorMsg: string): string => `WebSocket error: ${errorMsg}`;
const KEEPALIVE_FAILED_ERROR = (missed: number): string =>
  `Keepalive failed: ${missed} pings without a pong`;
const SEND_FAILED_ERROR = (errorMsg: string): string => `Failed to send request: ${errorMsg}`;

/**
 * Factory function for creating WebSocket instances.
 *
 * Allows dependency injection for testing by providing fake WebSocket
 * implementations while using the real `ws` client in production.
 */
export type WebSocketFactory = (url: string) => WebSocket;

export interface SocketTransportOptions<T> extends TransportOptions<T> {
  /** Ping interval in milliseconds; 0 disables keepalive (default: 30000) */
  keepaliveIntervalMs?: number;
  /** Unanswered pings tolerated before failing (default: 3) */
  maxMissedPongs?: number;
  createWebSocket?: WebSocketFactory;
}

/**
 * Convert WebSocket raw data to a Buffer.
 *
 * Handles every shape `ws` delivers (Buffer, fragmented Buffer[], ArrayBuffer)
 * as well as plain strings.
 */
export function rawDataToBuffer(data: WebSocket.RawData | string): Buffer {
  if (typeof data === 'string') {
    return Buffer.from(data, UTF8_ENCODING);
  }
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

/**
 * Duplex-socket transport over `ws`.
 *
 * Every text or binary message may carry one or more JSONL records. While
 * connected a ping goes out every `keepaliveIntervalMs`; after
 * `maxMissedPongs` unanswered pings the connection fails.
 */
export class SocketTransport<T> extends BaseTransport<T> {
  readonly kind = 'socket' as const;

  private ws: WebSocket | null = null;
  private pingInterval: NodeJS.Timeout | null = null;
  private missedPongs = 0;
  private readonly keepaliveIntervalMs: number;
  private readonly maxMissedPongs: number;
  private readonly createWebSocket: WebSocketFactory;

  constructor(options: SocketTransportOptions<T>) {
    super(options, createLogger('socket'));
    this.keepaliveIntervalMs = options.keepaliveIntervalMs ?? DEFAULT_KEEPALIVE_INTERVAL_MS;
    this.maxMissedPongs = options.maxMissedPongs ?? DEFAULT_MAX_MISSED_PONGS;
    this.createWebSocket = options.createWebSocket ?? ((url: string) => new WebSocket(url));
  }

  protected openConnection(endpoint: string, signal: AbortSignal): Promise<void> {
    const url = toWebSocketUrl(endpoint);
    this.log.debug(`Connecting to ${url}`);

    return new Promise<void>((resolve, reject) => {
      const ws = this.createWebSocket(url);
      this.ws = ws;

      const cleanup = (): void => {
        signal.removeEventListener('abort', onAbort);
        ws.off('open', onOpen);
        ws.off('error', onError);
        ws.off('close', onClose);
      };

      const onOpen = (): void => {
        cleanup();
        this.attachSessionHandlers(ws);
        this.startKeepalive();
        resolve();
      };

      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };

      const onClose = (code: number, reason: Buffer): void => {
        cleanup();
        reject(new StreamConnectionError(HANDSHAKE_CLOSED_ERROR(code, reason.toString())));
      };

      const onAbort = (): void => {
        cleanup();
        reject(toError(signal.reason));
      };

      if (signal.aborted) {
        onAbort();
        return;
      }

      signal.addEventListener('abort', onAbort, { once: true });
      ws.on('open', onOpen);
      ws.on('error', onError);
      ws.on('close', onClose);
    });
  }

  protected releaseTransport(graceful: boolean): void {
    const ws = this.detach();
    if (!ws) {
      return;
    }

    if (graceful && ws.readyState === WebSocket.OPEN) {
      ws.close(WEBSOCKET_NORMAL_CLOSURE, NORMAL_CLOSURE_REASON);
    } else {
      ws.terminate();
    }
  }

  protected transmit(payload: string): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new StreamConnectionError(NOT_OPEN_ERROR));
    }

    return new Promise<void>((resolve, reject) => {
      ws.send(payload, (error?: Error) => {
        if (error) {
          reject(new StreamConnectionError(SEND_FAILED_ERROR(error.message), error));
          return;
        }
        resolve();
      });
    });
  }

  private attachSessionHandlers(ws: WebSocket): void {
    ws.on('message', (data: WebSocket.RawData) => {
      this.ingest(rawDataToBuffer(data));
    });

    ws.on('pong', () => {
      this.missedPongs = 0;
    });

    ws.on('close', (code: number, reason: Buffer) => {
      this.handleSocketClose(code, reason.toString());
    });

    ws.on('error', (error: Error) => {
      this.handleFailure(new StreamConnectionError(SOCKET_ERROR(error.message), error));
    });
  }

  private handleSocketClose(code: number, reason: string): void {
    this.log.debug(SOCKET_CLOSED_ERROR(code, reason));
    if (code === WEBSOCKET_NORMAL_CLOSURE) {
      this.handleRemoteClose();
      return;
    }
    this.handleFailure(new StreamConnectionError(SOCKET_CLOSED_ERROR(code, reason)));
  }

  /**
   * A pong resets the counter; once `maxMissedPongs` pings go unanswered
   * the socket is closed and the connection fails.
   */
  private startKeepalive(): void {
    this.missedPongs = 0;
    if (this.keepaliveIntervalMs <= 0) {
      return;
    }

    this.pingInterval = setInterval(() => {
      const ws = this.ws;
      if (!ws || ws.readyState !== WebSocket.OPEN) {
        return;
      }

      if (this.missedPongs >= this.maxMissedPongs) {
        const error = new StreamConnectionError(KEEPALIVE_FAILED_ERROR(this.missedPongs));
        this.detach();
        ws.close(WEBSOCKET_GOING_AWAY, NO_PONG_RECEIVED_REASON);
        this.handleFailure(error);
        return;
      }

      this.missedPongs++;
      ws.ping();
    }, this.keepaliveIntervalMs);
  }

  private stopKeepalive(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  /**
   * Stop keepalive and unhook every listener, leaving a debug-level error
   * sink so late socket errors are not raised as uncaught.
   */
  private detach(): WebSocket | null {
    this.stopKeepalive();
    const ws = this.ws;
    this.ws = null;
    if (!ws) {
      return null;
    }

    ws.removeAllListeners();
    ws.on('error', (error: Error) => {
      this.log.debug(`Error after release: ${error.message}`);
    });
    return ws;
  }
}
