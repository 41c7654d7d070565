/**
 * FakeEventStreamServer - In-process stand-in for a text/event-stream endpoint
 *
 * Exposes a `fetch` function for EventStreamTransport's `fetch` option.
 * GET requests receive a streaming Response the test writes into with
 * push(); POST requests are recorded and answered with `postStatus`.
 */

export interface RecordedRequest {
  url: string;
  method: string;
  /** Header names lower-cased */
  headers: Record<string, string>;
  body: string | undefined;
}

export interface FakeEventStreamOptions {
  /** Status of the stream response (default: 200) */
  status?: number;
  statusText?: string;
  /** Content-Type of the stream response (default: text/event-stream) */
  contentType?: string;
  /** Never answer the GET; it only rejects when its signal aborts */
  hang?: boolean;
  /** Answer the GET without a body */
  emptyBody?: boolean;
  /** Status for POST requests (default: 202) */
  postStatus?: number;
}

type FetchArgs = Parameters<typeof fetch>;

const encoder = new TextEncoder();

export class FakeEventStreamServer {
  readonly requests: RecordedRequest[] = [];
  private controller: ReadableStreamDefaultController<Uint8Array> | null = null;
  private cancelledStreams = 0;

  constructor(private readonly options: FakeEventStreamOptions = {}) {}

  readonly fetch = async (...[input, init]: FetchArgs): Promise<Response> => {
    const request = recordRequest(input, init);
    this.requests.push(request);

    if (request.method === 'POST') {
      return new Response(null, { status: this.options.postStatus ?? 202 });
    }

    if (this.options.hang) {
      return new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    }

    const status = this.options.status ?? 200;
    const headers = { 'content-type': this.options.contentType ?? 'text/event-stream' };
    if (status !== 200) {
      return new Response('unavailable', {
        status,
        statusText: this.options.statusText ?? '',
        headers,
      });
    }
    if (this.options.emptyBody) {
      return new Response(null, { status, headers });
    }

    const body = new ReadableStream<Uint8Array>({
      start: (controller) => {
        this.controller = controller;
      },
      cancel: () => {
        this.cancelledStreams++;
        this.controller = null;
      },
    });
    return new Response(body, { status, headers });
  };

  /**
   * TEST CONTROL - Write raw event-stream text to the open response
   */
  push(text: string | Uint8Array): void {
    this.controller?.enqueue(typeof text === 'string' ? encoder.encode(text) : text);
  }

  /**
   * TEST CONTROL - Send one event whose data is `data`
   */
  sendEvent(data: string, id?: string): void {
    const lines = data.split('\n').map((line) => `data: ${line}`);
    if (id !== undefined) {
      lines.unshift(`id: ${id}`);
    }
    this.push(`${lines.join('\n')}\n\n`);
  }

  /**
   * TEST CONTROL - End the response cleanly
   */
  end(): void {
    this.controller?.close();
    this.controller = null;
  }

  /**
   * TEST CONTROL - Break the response mid-stream
   */
  fail(error: Error): void {
    this.controller?.error(error);
    this.controller = null;
  }

  get streamRequests(): RecordedRequest[] {
    return this.requests.filter((request) => request.method === 'GET');
  }

  get postedBodies(): string[] {
    return this.requests
      .filter((request) => request.method === 'POST')
      .map((request) => request.body ?? '');
  }

  get cancelled(): number {
    return this.cancelledStreams;
  }
}

function recordRequest(input: FetchArgs[0], init: FetchArgs[1]): RecordedRequest {
  const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return {
    url,
    method: init?.method ?? 'GET',
    headers,
    body: typeof init?.body === 'string' ? init.body : undefined,
  };
}
