/**
 * Default clock implementation.
 *
 * Thin wrapper over globalThis timers.
 * Tests inject a fake clock for deterministic behavior.
 */

import type { Clock } from "./clock-types.js";

export const defaultClock: Clock = {
  now: () => Date.now(),
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (id) => globalThis.clearTimeout(id),
};
