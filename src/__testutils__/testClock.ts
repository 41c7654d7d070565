/**
 * testClock - Install a FakeClock in place of the global timers
 */

import { FakeClock } from './FakeClock.js';

export interface ClockHelper {
  clock: FakeClock;
  /** Move time forward, firing due timers and settling promises */
  advance: (ms: number) => Promise<void>;
  /** Put the real timers back. Call in afterEach(). */
  restore: () => void;
}

/**
 * Replace setTimeout / setInterval and their clear functions with a fake clock.
 *
 * setImmediate and Date.now stay real; code that needs a controllable
 * wall clock takes a `now` option instead.
 *
 * Usage:
 * ```typescript
 * const { advance, restore } = useFakeClock();
 *
 * const pending = transport.connect('ws://127.0.0.1:9000/stream'); // starts the connect timer
 * await advance(10000);
 * await assert.rejects(pending, StreamTimeoutError);
 * restore();
 * ```
 */
export function useFakeClock(): ClockHelper {
  const clock = new FakeClock();

  const originalSetTimeout = global.setTimeout;
  const originalClearTimeout = global.clearTimeout;
  const originalSetInterval = global.setInterval;
  const originalClearInterval = global.clearInterval;

  // Handles are plain numbers; code under test only passes them back to clear*
  global.setTimeout = ((callback: () => void, delayMs?: number) =>
    clock.setTimeout(callback, delayMs)) as unknown as typeof setTimeout;
  global.clearTimeout = ((id: number) => clock.clearTimer(id)) as unknown as typeof clearTimeout;
  global.setInterval = ((callback: () => void, intervalMs: number) =>
    clock.setInterval(callback, intervalMs)) as unknown as typeof setInterval;
  global.clearInterval = ((id: number) => clock.clearTimer(id)) as unknown as typeof clearInterval;

  return {
    clock,
    advance: (ms: number) => clock.advance(ms),
    restore(): void {
      global.setTimeout = originalSetTimeout;
      global.clearTimeout = originalClearTimeout;
      global.setInterval = originalSetInterval;
      global.clearInterval = originalClearInterval;
      clock.reset();
    },
  };
}
