/**
 * Type guards used as decoder schemas.
 *
 * A schema is a plain `(value: unknown) => value is T` predicate, so any
 * runtime check can be plugged into the decoder.
 */

import type { MessageSchema } from '@/pipeline/types.js';
import type { StreamMessage, StreamMessageError } from '@/types.js';

/**
 * Check for a plain JSON object (not null, not an array).
 *
 * @example
 * ```typescript
 * isRecord({ a: 1 }) // true
 * isRecord([1, 2])   // false
 * isRecord(null)     // false
 * ```
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStreamMessageError(value: unknown): value is StreamMessageError {
  return (
    isRecord(value) && typeof value['code'] === 'number' && typeof value['message'] === 'string'
  );
}

/**
 * Default schema for the session protocol.
 *
 * Accepts any JSON object whose well-known fields, when present, have the
 * expected types.
 *
 * @example
 * ```typescript
 * isStreamMessage({ method: 'session.output', params: { text: 'hi' } }) // true
 * isStreamMessage({ id: 7, result: null })                              // true
 * isStreamMessage({ id: true })                                         // false
 * isStreamMessage('text')                                               // false
 * ```
 */
export function isStreamMessage(value: unknown): value is StreamMessage {
  if (!isRecord(value)) {
    return false;
  }

  const { id, method, error } = value;
  if (id !== undefined && typeof id !== 'string' && typeof id !== 'number') {
    return false;
  }
  if (method !== undefined && typeof method !== 'string') {
    return false;
  }
  if (error !== undefined && !isStreamMessageError(error)) {
    return false;
  }
  return true;
}

/**
 * Build a schema that only requires an object carrying the given keys.
 *
 * @example
 * ```typescript
 * const schema = requireKeys('type', 'payload');
 * schema({ type: 'tick', payload: 1 }) // true
 * schema({ type: 'tick' })             // false
 * ```
 */
export function requireKeys<K extends string>(...keys: K[]): MessageSchema<Record<K, unknown>> {
  return (value: unknown): value is Record<K, unknown> =>
    isRecord(value) && keys.every((key) => key in value);
}
