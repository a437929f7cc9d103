/**
 * RetryScheduler - per-error-code backoff state machine
 *
 * Idle → Scheduled(attempt, delay) → Idle, with Scheduled → Cancelled when
 * the owner dismisses the error or shuts down.
 *
 * - delay = baseDelayMs * 2^attempts (no jitter)
 * - attempts never exceed maxAttempts; reaching it means give up
 * - at most one pending timer per code; scheduling again while one is
 *   pending re-arms it and the new timer runs every queued operation
 * - a timer whose state was cancelled or replaced does nothing when it fires
 */

import type { Clock, TimerId } from "@lumen/core";

export interface RetrySchedulerOptions {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly clock: Clock;
}

export type ScheduleResult =
  | { readonly status: "scheduled"; readonly attempt: number; readonly delayMs: number }
  | { readonly status: "exhausted"; readonly attempts: number };

interface PendingRetry {
  readonly timerId: TimerId;
  readonly token: number;
  readonly delayMs: number;
  /** Queued callbacks by key, in the order they were queued */
  readonly jobs: Map<unknown, () => void>;
}

interface RetryState {
  attempts: number;
  pending: PendingRetry | undefined;
}

export class RetryScheduler {
  private readonly states = new Map<string, RetryState>();
  private readonly options: RetrySchedulerOptions;
  private nextToken = 1;

  constructor(options: RetrySchedulerOptions) {
    this.options = options;
  }

  /** Attempts consumed for `code` since its last success or cancellation */
  attempts(code: string): number {
    return this.states.get(code)?.attempts ?? 0;
  }

  hasPending(code: string): boolean {
    return this.states.get(code)?.pending !== undefined;
  }

  /** Delay of pending retries across all codes, in scheduling order */
  pendingDelays(): number[] {
    const delays: { token: number; delayMs: number }[] = [];
    for (const state of this.states.values()) {
      if (state.pending) delays.push(state.pending);
    }
    return delays.sort((a, b) => a.token - b.token).map((p) => p.delayMs);
  }

  /** Backoff delay the next automatic retry of `code` would use */
  nextDelayMs(code: string): number {
    return this.options.baseDelayMs * 2 ** this.attempts(code);
  }

  /**
   * Arm a backoff timer for `code` that calls `fire` once, or report that
   * the ceiling is reached. Callbacks still waiting on a pending timer for
   * the code move to the new one; `key` identifies a callback so the same
   * operation queued twice runs once.
   */
  scheduleAutoRetry(code: string, fire: () => void, key: unknown = fire): ScheduleResult {
    const state = this.stateFor(code);
    if (state.attempts >= this.options.maxAttempts) {
      return { status: "exhausted", attempts: state.attempts };
    }

    const delayMs = this.nextDelayMs(code);
    state.attempts += 1;
    this.arm(code, state, delayMs, this.takeJobs(state, key, fire));
    return { status: "scheduled", attempt: state.attempts, delayMs };
  }

  /**
   * User-driven retry. Counts one attempt (saturating at the ceiling) and
   * calls `fire` together with any callbacks of a pending timer after
   * `delayMs`, or right away when the delay is zero. Returns the attempt
   * count.
   */
  scheduleManual(code: string, delayMs: number, fire: () => void, key: unknown = fire): number {
    const state = this.stateFor(code);
    const jobs = this.takeJobs(state, key, fire);
    state.attempts = Math.min(state.attempts + 1, this.options.maxAttempts);

    if (delayMs <= 0) {
      for (const job of jobs.values()) job();
    } else {
      this.arm(code, state, delayMs, jobs);
    }
    return state.attempts;
  }

  /**
   * A retry of `code` succeeded: the backoff curve starts over. A pending
   * timer was armed by a later failure and stays armed.
   */
  recordSuccess(code: string): void {
    const state = this.states.get(code);
    if (!state) {
      return;
    }
    state.attempts = 0;
    if (state.pending === undefined) {
      this.states.delete(code);
    }
  }

  /**
   * Invalidate pending timers and drop state, for one code or for all.
   * No-op for idle codes.
   */
  cancelAll(code?: string): void {
    if (code !== undefined) {
      const state = this.states.get(code);
      if (state) {
        this.disarm(state);
        this.states.delete(code);
      }
      return;
    }

    for (const state of this.states.values()) {
      this.disarm(state);
    }
    this.states.clear();
  }

  private stateFor(code: string): RetryState {
    let state = this.states.get(code);
    if (!state) {
      state = { attempts: 0, pending: undefined };
      this.states.set(code, state);
    }
    return state;
  }

  /** Disarm the pending timer and return its callbacks followed by `fire` */
  private takeJobs(state: RetryState, key: unknown, fire: () => void): Map<unknown, () => void> {
    const jobs = new Map(state.pending?.jobs);
    this.disarm(state);
    jobs.delete(key);
    jobs.set(key, fire);
    return jobs;
  }

  private arm(
    code: string,
    state: RetryState,
    delayMs: number,
    jobs: Map<unknown, () => void>,
  ): void {
    const token = this.nextToken++;
    const timerId = this.options.clock.setTimeout(() => {
      // Check against the live state, not the one captured at scheduling
      const current = this.states.get(code);
      if (current?.pending?.token !== token) {
        return;
      }
      current.pending = undefined;
      for (const job of jobs.values()) job();
    }, delayMs);
    state.pending = { timerId, token, delayMs, jobs };
  }

  private disarm(state: RetryState): void {
    if (state.pending) {
      this.options.clock.clearTimeout(state.pending.timerId);
      state.pending = undefined;
    }
  }
}
