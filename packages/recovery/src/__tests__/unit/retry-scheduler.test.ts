import { createTestClock, type TestClock } from "@lumen/test-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { RetryScheduler } from "../../retry-scheduler.js";

describe("RetryScheduler", () => {
  let clock: TestClock;
  let scheduler: RetryScheduler;

  beforeEach(() => {
    clock = createTestClock(0);
    scheduler = new RetryScheduler({ maxAttempts: 3, baseDelayMs: 2000, clock });
  });

  describe("scheduleAutoRetry", () => {
    it("backs off 2s, 4s, 8s and then gives up", () => {
      const fire = vi.fn();

      expect(scheduler.scheduleAutoRetry("NET_002", fire)).toEqual({
        status: "scheduled",
        attempt: 1,
        delayMs: 2000,
      });
      clock.advance(2000);
      expect(scheduler.scheduleAutoRetry("NET_002", fire)).toEqual({
        status: "scheduled",
        attempt: 2,
        delayMs: 4000,
      });
      clock.advance(4000);
      expect(scheduler.scheduleAutoRetry("NET_002", fire)).toEqual({
        status: "scheduled",
        attempt: 3,
        delayMs: 8000,
      });
      clock.advance(8000);

      expect(scheduler.scheduleAutoRetry("NET_002", fire)).toEqual({
        status: "exhausted",
        attempts: 3,
      });
      expect(clock.pending()).toEqual([]);
      expect(fire).toHaveBeenCalledTimes(3);
    });

    it("fires the operation exactly once when the delay elapses", () => {
      const fire = vi.fn();
      scheduler.scheduleAutoRetry("NET_002", fire);

      clock.advance(1999);
      expect(fire).not.toHaveBeenCalled();
      expect(scheduler.hasPending("NET_002")).toBe(true);

      clock.advance(1);
      expect(fire).toHaveBeenCalledTimes(1);
      expect(scheduler.hasPending("NET_002")).toBe(false);

      clock.advance(60_000);
      expect(fire).toHaveBeenCalledTimes(1);
    });

    it("keeps a single pending timer per code that runs every queued callback", () => {
      const first = vi.fn();
      const second = vi.fn();
      scheduler.scheduleAutoRetry("NET_002", first);
      scheduler.scheduleAutoRetry("NET_002", second);

      expect(clock.pending()).toHaveLength(1);
      expect(clock.pending()[0]?.delayMs).toBe(4000);
      clock.advance(3999);
      expect(first).not.toHaveBeenCalled();
      clock.advance(1);
      expect(first).toHaveBeenCalledTimes(1);
      expect(second).toHaveBeenCalledTimes(1);
      clock.advance(10_000);
      expect(first).toHaveBeenCalledTimes(1);
    });

    it("queues a callback once per key, keeping the newest", () => {
      const older = vi.fn();
      const newer = vi.fn();
      scheduler.scheduleAutoRetry("NET_002", older, "fetchCatalog");
      scheduler.scheduleAutoRetry("NET_002", newer, "fetchCatalog");

      clock.advance(4000);

      expect(older).not.toHaveBeenCalled();
      expect(newer).toHaveBeenCalledTimes(1);
    });

    it("tracks codes independently", () => {
      scheduler.scheduleAutoRetry("NET_002", vi.fn());
      scheduler.scheduleAutoRetry("NET_002", vi.fn());
      const result = scheduler.scheduleAutoRetry("CHT_005", vi.fn());

      expect(result).toEqual({ status: "scheduled", attempt: 1, delayMs: 2000 });
      expect(scheduler.attempts("NET_002")).toBe(2);
      expect(scheduler.pendingDelays()).toEqual([4000, 2000]);
    });
  });

  describe("recordSuccess", () => {
    it("resets the backoff curve", () => {
      scheduler.scheduleAutoRetry("NET_002", vi.fn());
      clock.advance(2000);
      scheduler.scheduleAutoRetry("NET_002", vi.fn());
      clock.advance(4000);

      scheduler.recordSuccess("NET_002");

      expect(scheduler.attempts("NET_002")).toBe(0);
      expect(scheduler.nextDelayMs("NET_002")).toBe(2000);
      expect(scheduler.scheduleAutoRetry("NET_002", vi.fn())).toEqual({
        status: "scheduled",
        attempt: 1,
        delayMs: 2000,
      });
    });

    it("leaves a timer armed by a later failure in place", () => {
      const later = vi.fn();
      scheduler.scheduleAutoRetry("NET_002", vi.fn());
      clock.advance(2000);
      scheduler.scheduleAutoRetry("NET_002", later);

      scheduler.recordSuccess("NET_002");

      expect(scheduler.attempts("NET_002")).toBe(0);
      expect(scheduler.pendingDelays()).toEqual([4000]);
      clock.advance(4000);
      expect(later).toHaveBeenCalledTimes(1);
    });

    it("is a no-op for an idle code", () => {
      scheduler.recordSuccess("GPU_003");
      expect(scheduler.attempts("GPU_003")).toBe(0);
    });
  });

  describe("cancelAll", () => {
    it("invalidates the pending timer and drops the state", () => {
      const fire = vi.fn();
      scheduler.scheduleAutoRetry("NET_002", fire);

      scheduler.cancelAll("NET_002");
      clock.advance(10_000);

      expect(fire).not.toHaveBeenCalled();
      expect(scheduler.attempts("NET_002")).toBe(0);
      expect(scheduler.hasPending("NET_002")).toBe(false);
    });

    it("is a no-op for an idle code", () => {
      expect(() => scheduler.cancelAll("GPU_003")).not.toThrow();
      expect(scheduler.attempts("GPU_003")).toBe(0);
    });

    it("cancels every code when called without one", () => {
      const a = vi.fn();
      const b = vi.fn();
      scheduler.scheduleAutoRetry("NET_002", a);
      scheduler.scheduleAutoRetry("CHT_005", b);

      scheduler.cancelAll();
      clock.advance(10_000);

      expect(a).not.toHaveBeenCalled();
      expect(b).not.toHaveBeenCalled();
      expect(clock.pending()).toEqual([]);
    });

    it("turns a timer that fires after cancellation into a no-op", () => {
      // A clock whose clearTimeout does nothing, so the stale callback still runs
      const leaky = createTestClock(0);
      const stubborn = new RetryScheduler({
        maxAttempts: 3,
        baseDelayMs: 2000,
        clock: { ...leaky, clearTimeout: () => undefined },
      });
      const fire = vi.fn();
      stubborn.scheduleAutoRetry("NET_002", fire);
      stubborn.cancelAll("NET_002");

      leaky.advance(2000);

      expect(fire).not.toHaveBeenCalled();
    });
  });

  describe("scheduleManual", () => {
    it("fires immediately for a zero delay and counts the attempt", () => {
      const fire = vi.fn();
      expect(scheduler.scheduleManual("NET_002", 0, fire)).toBe(1);
      expect(fire).toHaveBeenCalledTimes(1);
      expect(scheduler.hasPending("NET_002")).toBe(false);
    });

    it("runs a pending automatic retry right away along with it", () => {
      const auto = vi.fn();
      const manual = vi.fn();
      scheduler.scheduleAutoRetry("NET_002", auto);

      scheduler.scheduleManual("NET_002", 0, manual);

      expect(auto).toHaveBeenCalledTimes(1);
      expect(manual).toHaveBeenCalledTimes(1);
      expect(clock.pending()).toEqual([]);
      clock.advance(10_000);
      expect(auto).toHaveBeenCalledTimes(1);
      expect(scheduler.attempts("NET_002")).toBe(2);
    });

    it("takes over a pending retry of the same operation", () => {
      const auto = vi.fn();
      const manual = vi.fn();
      scheduler.scheduleAutoRetry("NET_002", auto, "fetchCatalog");

      scheduler.scheduleManual("NET_002", 0, manual, "fetchCatalog");
      clock.advance(10_000);

      expect(auto).not.toHaveBeenCalled();
      expect(manual).toHaveBeenCalledTimes(1);
    });

    it("waits the requested delay, independent of the backoff curve", () => {
      const fire = vi.fn();
      scheduler.scheduleManual("NET_002", 5000, fire);

      clock.advance(4999);
      expect(fire).not.toHaveBeenCalled();
      clock.advance(1);
      expect(fire).toHaveBeenCalledTimes(1);
    });

    it("saturates at the ceiling so later automatic retries give up", () => {
      for (let i = 0; i < 5; i++) {
        scheduler.scheduleManual("NET_002", 0, vi.fn());
      }
      expect(scheduler.attempts("NET_002")).toBe(3);
      expect(scheduler.scheduleAutoRetry("NET_002", vi.fn()).status).toBe("exhausted");
    });
  });
});
