/**
 * text/event-stream framing.
 *
 * Handles `event`, `data`, `id` and `retry` fields, `:` comment lines,
 * LF / CR / CRLF line endings (including a CRLF split across chunks) and
 * UTF-8 sequences split across chunks. An event is dispatched on a blank
 * line; an event still incomplete when the stream ends is discarded.
 */

import { DEFAULT_MAX_BUFFER_BYTES } from '@/constants.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';

const LF = 10;
const CR = 13;
const DEFAULT_EVENT_TYPE = 'message';

export interface SseEvent {
  /** Event type (`message` unless the server set `event:`) */
  event: string;
  /** Data lines joined with `\n` */
  data: string;
  /** Last event id in effect when the event was dispatched */
  id: string | undefined;
}

export class SseFrameDecoder {
  private text = new TextDecoder('utf-8');
  private pending = '';
  private skipLeadingLf = false;
  private dataLines: string[] = [];
  private eventType = '';
  private idBuffer: string | undefined;
  private dispatchedId: string | undefined;
  private retry: number | undefined;

  constructor(
    private readonly maxLineLength: number = DEFAULT_MAX_BUFFER_BYTES,
    private readonly log: Logger = createLogger('sse')
  ) {}

  /**
   * Decode a chunk and return the events it completes.
   */
  push(chunk: Uint8Array | string): SseEvent[] {
    let text = typeof chunk === 'string' ? chunk : this.text.decode(chunk, { stream: true });
    if (this.skipLeadingLf && text.length > 0) {
      if (text.charCodeAt(0) === LF) {
        text = text.slice(1);
      }
      this.skipLeadingLf = false;
    }

    const buffer = this.pending + text;
    const events: SseEvent[] = [];
    let start = 0;

    for (let i = 0; i < buffer.length; i++) {
      const code = buffer.charCodeAt(i);
      if (code !== LF && code !== CR) {
        continue;
      }

      const event = this.processLine(buffer.slice(start, i));
      if (event) {
        events.push(event);
      }

      if (code === CR) {
        if (i + 1 < buffer.length) {
          if (buffer.charCodeAt(i + 1) === LF) {
            i++;
          }
        } else {
          this.skipLeadingLf = true;
        }
      }
      start = i + 1;
    }

    this.pending = buffer.slice(start);
    if (this.pending.length > this.maxLineLength) {
      this.log.info(
        `Event-stream line exceeded ${this.maxLineLength} characters; ` +
          'discarding it and the current event'
      );
      this.pending = '';
      this.resetEvent();
    }

    return events;
  }

  /**
   * Last event id seen, for the Last-Event-ID header of the next connection.
   */
  get lastEventId(): string | undefined {
    return this.dispatchedId;
  }

  /**
   * Reconnection delay requested by the server via `retry:`.
   */
  get retryMs(): number | undefined {
    return this.retry;
  }

  /**
   * Forget the partial line, event and any held UTF-8 bytes. The last event
   * id is kept.
   */
  reset(): void {
    this.text = new TextDecoder('utf-8');
    this.pending = '';
    this.skipLeadingLf = false;
    this.resetEvent();
  }

  private processLine(line: string): SseEvent | null {
    if (line.length === 0) {
      return this.dispatch();
    }
    if (line.startsWith(':')) {
      return null;
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'data':
        this.dataLines.push(value);
        break;
      case 'event':
        this.eventType = value;
        break;
      case 'id':
        if (!value.includes('\0')) {
          this.idBuffer = value;
        }
        break;
      case 'retry':
        if (/^\d+$/.test(value)) {
          this.retry = parseInt(value, 10);
        }
        break;
      default:
        this.log.debug(`Ignoring unknown event-stream field "${field}"`);
    }
    return null;
  }

  private dispatch(): SseEvent | null {
    this.dispatchedId = this.idBuffer;

    if (this.dataLines.length === 0) {
      this.eventType = '';
      return null;
    }

    const event: SseEvent = {
      event: this.eventType || DEFAULT_EVENT_TYPE,
      data: this.dataLines.join('\n'),
      id: this.dispatchedId,
    };
    this.resetEvent();
    return event;
  }

  private resetEvent(): void {
    this.dataLines = [];
    this.eventType = '';
  }
}
