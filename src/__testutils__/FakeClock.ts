/**
 * FakeClock - Deterministic timer control for tests
 *
 * Stands in for setTimeout / setInterval. Timers fire in due order while
 * `advance()` moves time forward, and pending promise callbacks are
 * allowed to settle after every timer so async code observes each step.
 */

interface ScheduledTimer {
  id: number;
  callback: () => void;
  dueAt: number;
  /** Repeat period for intervals */
  every?: number;
}

/**
 * Let queued promise callbacks run (uses the real setImmediate).
 */
export function settle(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

export class FakeClock {
  private currentTime = 0;
  private nextTimerId = 1;
  private readonly timers = new Map<number, ScheduledTimer>();

  now(): number {
    return this.currentTime;
  }

  setTimeout(callback: () => void, delayMs: number = 0): number {
    return this.schedule(callback, Math.max(0, delayMs));
  }

  setInterval(callback: () => void, intervalMs: number): number {
    const every = Math.max(1, intervalMs);
    return this.schedule(callback, every, every);
  }

  clearTimer(id: number): void {
    this.timers.delete(id);
  }

  /**
   * Fire every timer that is already due, without moving time.
   */
  runDue(): void {
    let timer = this.nextDue(this.currentTime);
    while (timer) {
      this.fire(timer);
      timer = this.nextDue(this.currentTime);
    }
  }

  /**
   * Move time forward by `ms`, firing timers in due order and settling
   * promise callbacks after each one.
   */
  async advance(ms: number): Promise<void> {
    const target = this.currentTime + ms;
    await settle();

    for (let timer = this.nextDue(target); timer; timer = this.nextDue(target)) {
      this.currentTime = timer.dueAt;
      this.fire(timer);
      await settle();
    }

    this.currentTime = target;
  }

  get pendingTimers(): number {
    return this.timers.size;
  }

  reset(): void {
    this.currentTime = 0;
    this.nextTimerId = 1;
    this.timers.clear();
  }

  private schedule(callback: () => void, delayMs: number, every?: number): number {
    const id = this.nextTimerId++;
    const timer: ScheduledTimer = { id, callback, dueAt: this.currentTime + delayMs };
    if (every !== undefined) {
      timer.every = every;
    }
    this.timers.set(id, timer);
    return id;
  }

  private nextDue(limit: number): ScheduledTimer | undefined {
    let next: ScheduledTimer | undefined;
    for (const timer of this.timers.values()) {
      if (timer.dueAt <= limit && (!next || timer.dueAt < next.dueAt)) {
        next = timer;
      }
    }
    return next;
  }

  private fire(timer: ScheduledTimer): void {
    if (timer.every === undefined) {
      this.timers.delete(timer.id);
    } else {
      timer.dueAt += timer.every;
    }
    timer.callback();
  }
}
