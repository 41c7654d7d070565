/**
 * Timer helpers for cooperative async code.
 *
 * Built on the global setTimeout so tests can drive them with a fake clock.
 *
 * @module utils/concurrency
 */

import { toError } from '@/utils/errors.js';

/**
 * Resolve after `ms` milliseconds, or reject as soon as `signal` aborts.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * await delay(250, controller.signal);
 * ```
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(toError(signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(toError(signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Yield once to the event loop so pending I/O and timers can run.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}
