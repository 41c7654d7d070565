/**
 * assertions - Custom assertion helpers for contract tests
 */

/**
 * Poll a condition until it becomes true or timeout
 *
 * Uses setImmediate between polls, so it also works while a fake clock
 * replaces setTimeout.
 *
 * @example
 * await assertEventually(() => server.streamRequests.length === 2, 1000);
 */
export async function assertEventually(
  fn: () => boolean,
  timeoutMs: number,
  message?: string
): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) {
      return;
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  throw new Error(message ?? `Condition not met within ${timeoutMs}ms`);
}

/**
 * Pull up to `count` values from an async iterator without closing it.
 */
export async function take<T>(iterator: AsyncIterator<T>, count: number): Promise<T[]> {
  const values: T[] = [];
  while (values.length < count) {
    const next = await iterator.next();
    if (next.done) {
      break;
    }
    values.push(next.value);
  }
  return values;
}

/**
 * Drain an async iterable, returning everything it produced.
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of iterable) {
    values.push(value);
  }
  return values;
}
