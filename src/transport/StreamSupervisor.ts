/**
 * Caller-side reconnection policy.
 *
 * Transports never retry on their own. The supervisor wraps one transport,
 * reconnects it with exponential backoff after connection-level failures and
 * presents the successive connections as a single message sequence.
 */

import {
  DEFAULT_BASE_RETRY_DELAY_MS,
  DEFAULT_MAX_RETRY_DELAY_MS,
  DEFAULT_RECONNECT_ATTEMPTS,
} from '@/constants.js';
import type { DecodedMessage } from '@/pipeline/types.js';
import { StreamConnectionError, StreamTimeoutError } from '@/transport/errors.js';
import type { TransportClient } from '@/transport/types.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';
import { delay } from '@/utils/concurrency.js';
import { toError } from '@/utils/errors.js';

// Message Templates
const RETRYING_MESSAGE = (delayMs: number, attempt: number, maxAttempts: number): string =>
  `Disconnected, retrying in ${delayMs}ms (attempt ${attempt}/${maxAttempts})`;
const GAVE_UP_MESSAGE = (attempts: number, errorMsg: string): string =>
  `Giving up after ${attempts} reconnection attempts: ${errorMsg}`;

export type SupervisorStatus =
  | { readonly status: 'connecting'; readonly attempt: number }
  | { readonly status: 'streaming' }
  | {
      readonly status: 'retrying';
      readonly attempt: number;
      readonly delayMs: number;
      readonly reason: Error;
    }
  | { readonly status: 'stopped' }
  | { readonly status: 'gave_up'; readonly reason: Error };

export interface StreamSupervisorOptions<T> {
  /** Reconnection attempts after a failure (default: 5) */
  maxAttempts?: number;
  /** First backoff delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Upper bound on the backoff delay in milliseconds (default: 10000) */
  maxDelayMs?: number;
  /** Receives every status change */
  onStatus?: (status: SupervisorStatus) => void;
  /** Runs after every successful connect, before streaming starts */
  onConnected?: (transport: TransportClient<T>) => Promise<void>;
}

/**
 * Exponential backoff capped at `maxDelayMs`.
 *
 * @param attempt - Zero-based attempt number
 *
 * @example
 * ```typescript
 * calculateBackoffDelay(0, 1000, 10000) // 1000
 * calculateBackoffDelay(3, 1000, 10000) // 8000
 * calculateBackoffDelay(4, 1000, 10000) // 10000
 * ```
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number
): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

/**
 * Only connection-level failures are worth another connect.
 */
export function isRetryableError(error: Error): boolean {
  return error instanceof StreamConnectionError || error instanceof StreamTimeoutError;
}

export class StreamSupervisor<T> {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly stopController = new AbortController();
  private running = false;

  constructor(
    private readonly transport: TransportClient<T>,
    private readonly endpoint: string,
    private readonly options: StreamSupervisorOptions<T> = {},
    private readonly log: Logger = createLogger('supervisor')
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_RECONNECT_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_RETRY_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS;
  }

  get stopped(): boolean {
    return this.stopController.signal.aborted;
  }

  /**
   * Messages across reconnections, in arrival order.
   *
   * Ends when the server closes the stream cleanly or stop() is called.
   * Throws the last error once the reconnection attempts are used up, or
   * at once for an error that is not connection-level.
   */
  async *messages(): AsyncGenerator<DecodedMessage<T>, void, undefined> {
    if (this.running) {
      throw new Error('StreamSupervisor.messages() is already running');
    }
    this.running = true;

    let failures = 0;
    let gaveUp = false;

    try {
      while (!this.stopped) {
        this.report({ status: 'connecting', attempt: failures + 1 });

        try {
          await this.transport.connect(this.endpoint);
          failures = 0;
          if (this.options.onConnected) {
            await this.options.onConnected(this.transport);
          }
          this.report({ status: 'streaming' });

          for await (const message of this.transport.receiveStream()) {
            yield message;
          }
          return;
        } catch (error) {
          const reason = toError(error);
          if (this.stopped) {
            return;
          }
          if (!isRetryableError(reason)) {
            throw reason;
          }
          if (failures >= this.maxAttempts) {
            gaveUp = true;
            this.log.info(GAVE_UP_MESSAGE(failures, reason.message));
            this.report({ status: 'gave_up', reason });
            throw reason;
          }

          const delayMs = calculateBackoffDelay(failures, this.baseDelayMs, this.maxDelayMs);
          failures++;
          this.log.info(RETRYING_MESSAGE(delayMs, failures, this.maxAttempts));
          this.report({ status: 'retrying', attempt: failures, delayMs, reason });

          const resumed = await this.wait(delayMs);
          if (!resumed) {
            return;
          }
        }
      }
    } finally {
      this.running = false;
      await this.transport.disconnect();
      if (!gaveUp) {
        this.report({ status: 'stopped' });
      }
    }
  }

  /**
   * Disconnect and end the message sequence. Idempotent.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopController.abort();
    await this.transport.disconnect();
  }

  /**
   * @returns false when stop() interrupted the wait
   */
  private async wait(delayMs: number): Promise<boolean> {
    try {
      await delay(delayMs, this.stopController.signal);
      return true;
    } catch (error) {
      this.log.debug(`Backoff interrupted: ${toError(error).message}`);
      return false;
    }
  }

  private report(status: SupervisorStatus): void {
    this.log.debug(`Status: ${status.status}`);
    this.options.onStatus?.(status);
  }
}
