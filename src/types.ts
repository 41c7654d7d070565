/**
 * Wire types of the upstream session protocol.
 *
 * The session service pushes JSONL records shaped like JSON-RPC frames:
 * notifications carry a `method`, replies carry the `id` of the request
 * they answer plus either `result` or `error`.
 */

export interface StreamMessageError {
  code: number;
  message: string;
  data?: unknown;
}

export interface StreamMessage {
  id?: string | number;
  method?: string;
  params?: unknown;
  result?: unknown;
  error?: StreamMessageError;
  [key: string]: unknown;
}

