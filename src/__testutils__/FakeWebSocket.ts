/**
 * FakeWebSocket - WebSocket boundary fake for testing
 *
 * Mimics the parts of the `ws` client that SocketTransport uses so the
 * transport can be contract-tested without network I/O. Injected through
 * the `createWebSocket` factory option.
 *
 * - readyState plus send / ping / close / terminate
 * - Events carry the same argument shapes as `ws` (close reasons and
 *   message payloads arrive as Buffers)
 * - simulate* methods drive the peer side from tests
 */

import { EventEmitter } from 'node:events';

// ws library readyState constants
export const CONNECTING = 0;
export const OPEN = 1;
export const CLOSING = 2;
export const CLOSED = 3;

type ReadyState = typeof CONNECTING | typeof OPEN | typeof CLOSING | typeof CLOSED;

export class FakeWebSocket extends EventEmitter {
  public readyState: ReadyState = CONNECTING;

  private sentMessages: string[] = [];
  private pingCount = 0;
  private closeCode: number | null = null;
  private closeReason: string | null = null;
  private terminated = false;
  private sendError: Error | null = null;

  static readonly CONNECTING = CONNECTING;
  static readonly OPEN = OPEN;
  static readonly CLOSING = CLOSING;
  static readonly CLOSED = CLOSED;

  constructor(readonly url: string = '') {
    super();
  }

  /**
   * ws API - Send a text frame
   */
  send(data: string, callback?: (err?: Error) => void): void {
    if (this.readyState !== OPEN) {
      callback?.(new Error(`WebSocket is not open: readyState ${this.readyState}`));
      return;
    }
    if (this.sendError) {
      callback?.(this.sendError);
      return;
    }

    this.sentMessages.push(data);
    callback?.();
  }

  /**
   * ws API - Send a ping frame
   */
  ping(): void {
    if (this.readyState === OPEN) {
      this.pingCount++;
    }
  }

  /**
   * ws API - Close handshake; completes at once
   */
  close(code?: number, reason?: string): void {
    if (this.readyState === CLOSED || this.readyState === CLOSING) {
      return;
    }

    this.readyState = CLOSED;
    this.closeCode = code ?? 1005;
    this.closeReason = reason ?? '';
    this.emit('close', this.closeCode, Buffer.from(this.closeReason));
  }

  /**
   * ws API - Destroy the socket without a close handshake
   */
  terminate(): void {
    if (this.readyState === CLOSED) {
      return;
    }

    this.readyState = CLOSED;
    this.terminated = true;
    this.closeCode = 1006;
    this.closeReason = '';
    this.emit('close', 1006, Buffer.alloc(0));
  }

  /**
   * TEST CONTROL - Complete the opening handshake
   */
  simulateOpen(): void {
    if (this.readyState !== CONNECTING) {
      throw new Error('Can only open from CONNECTING state');
    }

    this.readyState = OPEN;
    this.emit('open');
  }

  /**
   * TEST CONTROL - Deliver a message from the peer
   */
  simulateMessage(data: string | Buffer): void {
    if (this.readyState !== OPEN) {
      throw new Error('Cannot receive message when not OPEN');
    }

    this.emit('message', typeof data === 'string' ? Buffer.from(data, 'utf8') : data);
  }

  /**
   * TEST CONTROL - Peer closes the connection with `code`
   */
  simulateClose(code: number, reason: string = ''): void {
    if (this.readyState === CLOSED) {
      return;
    }

    this.readyState = CLOSED;
    this.closeCode = code;
    this.closeReason = reason;
    this.emit('close', code, Buffer.from(reason));
  }

  simulateError(error: Error): void {
    this.emit('error', error);
  }

  /**
   * TEST CONTROL - Answer a keepalive ping
   */
  simulatePong(): void {
    if (this.readyState !== OPEN) {
      throw new Error('Cannot receive pong when not OPEN');
    }

    this.emit('pong', Buffer.alloc(0));
  }

  /**
   * TEST CONTROL - Make every following send() fail with `error`
   */
  failSends(error: Error): void {
    this.sendError = error;
  }

  /**
   * VERIFICATION - Sent frames (copy)
   */
  getSentMessages(): string[] {
    return [...this.sentMessages];
  }

  getPingCount(): number {
    return this.pingCount;
  }

  getCloseCode(): number | null {
    return this.closeCode;
  }

  getCloseReason(): string | null {
    return this.closeReason;
  }

  wasTerminated(): boolean {
    return this.terminated;
  }
}
