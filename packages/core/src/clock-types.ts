/**
 * Clock abstraction, injectable for deterministic testing.
 *
 * Production code uses globalThis timers via `defaultClock`.
 * Tests inject a fake clock that controls time explicitly.
 */

export type TimerId = ReturnType<typeof globalThis.setTimeout>;

export interface Clock {
  readonly now: () => number;
  readonly setTimeout: (fn: () => void, ms: number) => TimerId;
  readonly clearTimeout: (id: TimerId) => void;
}
