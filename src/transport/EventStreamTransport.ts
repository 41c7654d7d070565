import { EVENT_STREAM_CONTENT_TYPE } from '@/constants.js';
import { BaseTransport } from '@/transport/BaseTransport.js';
import { StreamConnectionError, StreamRequestError } from '@/transport/errors.js';
import { SseFrameDecoder } from '@/transport/SseFrameDecoder.js';
import type { TransportOptions } from '@/transport/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage, toError } from '@/utils/errors.js';
import { toHttpUrl } from '@/utils/url.js';

// Error Messages
const NO_BODY_ERROR = 'Event stream response has no body';
const NOT_OPEN_ERROR = 'Event stream is not open';

// Message Templates
const HTTP_STATUS_ERROR = (status: number, statusText: string): string =>
  `Event stream handshake failed: HTTP ${status}${statusText ? ` ${statusText}` : ''}`;
const CONTENT_TYPE_ERROR = (contentType: string): string =>
  `Expected ${EVENT_STREAM_CONTENT_TYPE} but server sent "${contentType}"`;
const READ_FAILED_ERROR = (errorMsg: string): string => `Event stream read failed: ${errorMsg}`;
const REQUEST_REJECTED_ERROR = (status: number): string => `Request rejected: HTTP ${status}`;
const REQUEST_FAILED_ERROR = (errorMsg: string): string => `Request failed: ${errorMsg}`;

type StreamReader = ReadableStreamDefaultReader<Uint8Array>;

export interface EventStreamTransportOptions<T> extends TransportOptions<T> {
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  /** Extra headers for the stream request and outbound requests */
  headers?: Record<string, string>;
}

/**
 * Server-Sent Events transport.
 *
 * The data of every event carries one JSONL record (multi-line data is
 * split by the line accumulator, so it may carry several). Requests go
 * out as JSON POSTs to the same endpoint.
 */
export class EventStreamTransport<T> extends BaseTransport<T> {
  readonly kind = 'event-stream' as const;

  private readonly fetchImpl: typeof fetch;
  private readonly headers: Record<string, string>;
  private readonly frames = new SseFrameDecoder();
  private endpoint: string | null = null;
  private abortController: AbortController | null = null;
  private reader: StreamReader | null = null;

  constructor(options: EventStreamTransportOptions<T>) {
    super(options, createLogger('sse'));
    this.fetchImpl = options.fetch ?? fetch;
    this.headers = options.headers ?? {};
  }

  /**
   * Id of the last event received, sent as Last-Event-ID on reconnect.
   */
  get lastEventId(): string | undefined {
    return this.frames.lastEventId;
  }

  /**
   * Reconnection delay the server asked for with `retry:`.
   */
  get retryHintMs(): number | undefined {
    return this.frames.retryMs;
  }

  protected async openConnection(endpoint: string, signal: AbortSignal): Promise<void> {
    const url = toHttpUrl(endpoint);
    this.endpoint = url;
    this.frames.reset();

    const controller = new AbortController();
    this.abortController = controller;
    const forwardAbort = (): void => controller.abort(signal.reason);
    if (signal.aborted) {
      forwardAbort();
    } else {
      signal.addEventListener('abort', forwardAbort, { once: true });
    }

    const headers: Record<string, string> = {
      ...this.headers,
      Accept: EVENT_STREAM_CONTENT_TYPE,
      'Cache-Control': 'no-cache',
    };
    const lastEventId = this.frames.lastEventId;
    if (lastEventId !== undefined) {
      headers['Last-Event-ID'] = lastEventId;
    }

    this.log.debug(`Opening event stream ${url}`);
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        await drainBody(response);
        throw new StreamConnectionError(HTTP_STATUS_ERROR(response.status, response.statusText));
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.startsWith(EVENT_STREAM_CONTENT_TYPE)) {
        await drainBody(response);
        throw new StreamConnectionError(CONTENT_TYPE_ERROR(contentType));
      }

      if (!response.body) {
        throw new StreamConnectionError(NO_BODY_ERROR);
      }

      this.reader = response.body.getReader();
    } finally {
      signal.removeEventListener('abort', forwardAbort);
    }
  }

  protected override onConnected(): void {
    super.onConnected();
    const reader = this.reader;
    if (reader) {
      void this.pump(reader);
    }
  }

  protected releaseTransport(_graceful: boolean): void {
    const reader = this.reader;
    this.reader = null;
    this.abortController?.abort();
    this.abortController = null;

    if (reader) {
      reader.cancel().catch((error: unknown) => {
        this.log.debug(`Reader cancel failed: ${getErrorMessage(error)}`);
      });
    }
  }

  protected async transmit(payload: string): Promise<void> {
    const url = this.endpoint;
    if (!url) {
      throw new StreamConnectionError(NOT_OPEN_ERROR);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { ...this.headers, 'Content-Type': 'application/json' },
        body: payload,
      });
    } catch (error) {
      throw new StreamRequestError(
        REQUEST_FAILED_ERROR(getErrorMessage(error)),
        undefined,
        toError(error)
      );
    }

    await drainBody(response);
    if (!response.ok) {
      throw new StreamRequestError(REQUEST_REJECTED_ERROR(response.status), response.status);
    }
  }

  /**
   * Read the response body until it ends or the transport lets go of it.
   * Never rejects: outcomes are reported through the base class.
   */
  private async pump(reader: StreamReader): Promise<void> {
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (this.reader !== reader) {
          return;
        }
        if (done) {
          break;
        }
        for (const event of this.frames.push(value)) {
          this.ingest(`${event.data}\n`);
        }
      }
    } catch (error) {
      if (this.reader === reader) {
        this.handleFailure(
          new StreamConnectionError(READ_FAILED_ERROR(getErrorMessage(error)), toError(error))
        );
      }
      return;
    }

    this.handleRemoteClose();
  }
}

async function drainBody(response: Response): Promise<void> {
  if (!response.body) {
    return;
  }
  try {
    await response.body.cancel();
  } catch (error) {
    createLogger('sse').debug(`Failed to discard response body: ${getErrorMessage(error)}`);
  }
}
