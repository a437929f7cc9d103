import type { Clock, TimerId } from "@lumen/core";

export interface PendingTimer {
  readonly id: number;
  readonly fireAt: number;
  readonly delayMs: number;
}

export interface TestClock extends Clock {
  /** Move time forward, firing due timers in due-time order */
  advance(ms: number): void;
  /** Timers not yet fired or cleared, in scheduling order */
  pending(): readonly PendingTimer[];
}

/**
 * Manually driven clock. Timers scheduled while advancing fire in the
 * same call if they fall due inside the window.
 */
export function createTestClock(startMs = 1000): TestClock {
  let time = startMs;
  const pending: Array<PendingTimer & { fn: () => void }> = [];
  let nextId = 1;

  return {
    now: () => time,
    setTimeout: (fn: () => void, ms: number) => {
      const id = nextId;
      nextId += 1;
      pending.push({ id, fn, fireAt: time + ms, delayMs: ms });
      return id as unknown as TimerId;
    },
    clearTimeout: (id: TimerId) => {
      const idx = pending.findIndex((p) => p.id === (id as unknown as number));
      if (idx >= 0) pending.splice(idx, 1);
    },
    advance(ms: number) {
      const target = time + ms;
      for (;;) {
        let due: (typeof pending)[number] | undefined;
        for (const timer of pending) {
          if (timer.fireAt <= target && (due === undefined || timer.fireAt < due.fireAt)) {
            due = timer;
          }
        }
        if (due === undefined) break;
        pending.splice(pending.indexOf(due), 1);
        time = due.fireAt;
        due.fn();
      }
      time = target;
    },
    pending() {
      return pending.map(({ id, fireAt, delayMs }) => ({ id, fireAt, delayMs }));
    },
  };
}
