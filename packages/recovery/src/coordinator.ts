/**
 * ErrorCoordinator - central error pipeline
 *
 * Every submitted error is classified, logged (sanitized) and kept in a
 * bounded history, then routed by severity:
 *
 * - critical: presented, logged as CRITICAL_ERROR, sent to the crash reporter
 * - high: presented
 * - medium: retried in the background with exponential backoff when it is
 *   retryable and the caller supplied a retry operation, presented otherwise
 *   or once the retry ceiling is reached
 * - low: logged only
 *
 * All coordinator state is touched only from synchronous code on the event
 * loop, so a single handle() call is never observed half-applied. Retry
 * operations run outside that; their results come back through
 * runRetryOperation().
 *
 * Nothing here throws to the caller. Failures of the log sink, the crash
 * reporter, listeners or metrics go to the fallback channel.
 */

import { describeThrown, logWarn } from "@lumen/core";
import {
  AppError,
  type ErrorSeverity,
  type RecoveryAction,
  wrapError,
} from "@lumen/errors";
import { REDACTED_TEXT } from "@lumen/sanitize";
import { type RecoveryConfig, type ResolvedRecoveryConfig, resolveRecoveryConfig } from "./config.js";
import type { CrashReport } from "./crash-reporter.js";
import { type DeviceInfo, formatSystemInfo } from "./device-info.js";
import {
  formatCriticalError,
  formatDeviceSuffix,
  formatHandledError,
  formatRecoveryAction,
  formatRetryAttempt,
  formatRetryExhausted,
  formatRetrySuccess,
  formatSystemInfoEntry,
} from "./log-message.js";
import {
  recordErrorHandled,
  recordRecoveryAction,
  recordRetryOutcome,
  recordRetryScheduled,
} from "./metrics.js";
import { buildSupportDiagnostics } from "./presentation.js";
import type { RecoveryRequestBus } from "./requests.js";
import { RetryScheduler } from "./retry-scheduler.js";
import { RingBuffer } from "./ring-buffer.js";
import { computeStatistics } from "./statistics.js";
import type {
  ErrorContext,
  ErrorLogEntry,
  ErrorStatistics,
  HandleOutcome,
  RetryOperation,
  RetryOutcome,
} from "./types.js";

const TAG = "@lumen/recovery";

export type PresentationListener = (error: AppError | undefined) => void;

export class ErrorCoordinator {
  private readonly config: ResolvedRecoveryConfig;
  private readonly scheduler: RetryScheduler;
  private readonly history: RingBuffer<ErrorLogEntry>;
  private readonly presentationListeners = new Set<PresentationListener>();
  private _currentError: AppError | undefined;
  private sequence = 0;
  /** Bumped by shutdown(); retry results from an older epoch are ignored */
  private epoch = 0;

  constructor(config: RecoveryConfig) {
    this.config = resolveRecoveryConfig(config);
    this.scheduler = new RetryScheduler({
      maxAttempts: this.config.maxAttempts,
      baseDelayMs: this.config.baseDelayMs,
      clock: this.config.clock,
    });
    this.history = new RingBuffer<ErrorLogEntry>(this.config.historyCapacity);
  }

  /** The error currently shown to the user, if any */
  get currentError(): AppError | undefined {
    return this._currentError;
  }

  get isShowingError(): boolean {
    return this._currentError !== undefined;
  }

  /** Outgoing requests for effects the host application performs */
  get requests(): RecoveryRequestBus {
    return this.config.requests;
  }

  /**
   * Submit an error. Anything that is not an AppError is wrapped as
   * `unexpectedError`. Returns the routing decision.
   */
  handle(error: unknown, context?: ErrorContext): HandleOutcome {
    const appError = wrapError(error);
    const entryId = this.record(appError, context);

    switch (appError.severity) {
      case "critical":
        this.setPresented(appError);
        this.logLine(formatCriticalError(appError), "critical");
        this.reportCrash(appError, context);
        return "presented";
      case "high":
        this.setPresented(appError);
        return "presented";
      case "medium":
        if (appError.retryable && context?.retryOperation) {
          return this.scheduleAutoRetry(appError, context, context.retryOperation, entryId);
        }
        this.setPresented(appError);
        return "presented";
      case "low":
        return "logged";
    }
  }

  /** Hide the presented error and forget its retry state */
  dismissError(): void {
    const current = this._currentError;
    if (current === undefined) {
      return;
    }
    this.scheduler.cancelAll(current.code);
    this.setPresented(undefined);
  }

  /**
   * Run the retry operation from `context` once, right away, together with
   * any operations waiting on a pending automatic retry of the same code.
   * Counts toward the ceiling.
   */
  manualRetry(error: unknown, context?: ErrorContext): void {
    this.scheduleUserRetry(wrapError(error), context, 0);
  }

  executeRecoveryAction(action: RecoveryAction, error: unknown, context?: ErrorContext): void {
    const appError = wrapError(error);
    this.logLine(formatRecoveryAction(appError.code, action), "medium");
    this.safely("metrics", () => recordRecoveryAction(action.type));

    const requests = this.config.requests;
    switch (action.type) {
      case "retry":
        this.scheduleUserRetry(appError, context, 0);
        return;
      case "retryWithDelay":
        this.scheduleUserRetry(appError, context, action.seconds * 1000);
        return;
      case "redownloadModel":
        requests.requestRedownload(action.modelName);
        return;
      case "clearCache":
        requests.requestClearCache();
        return;
      case "freeMemory":
        requests.requestFreeMemory();
        return;
      case "restartApp":
        requests.requestRestart();
        return;
      case "checkNetwork":
        requests.requestOpenSettings("network");
        return;
      case "checkStorage":
        requests.requestNavigateToStorage();
        return;
      case "contactSupport":
        requests.requestContactSupport(
          buildSupportDiagnostics(appError, this.config.clock.now(), this.collectDevice()),
        );
        return;
      case "dismiss":
        this.dismissError();
        return;
      case "openSettings":
        requests.requestOpenSettings();
        return;
      case "switchFallbackModel":
        requests.requestSwitchFallbackModel();
        return;
    }
  }

  /** Recomputed from the history on every call */
  getStatistics(): ErrorStatistics {
    return computeStatistics(this.history.toArray(), this.config.clock.now());
  }

  /** Handled errors, oldest first */
  getHistory(): readonly ErrorLogEntry[] {
    return this.history.toArray();
  }

  /** Drop the history together with all retry state and pending retries */
  clearHistory(): void {
    this.history.clear();
    this.scheduler.cancelAll();
  }

  /** Attempts consumed for `code` since its last success or dismissal */
  retryAttempts(code: string): number {
    return this.scheduler.attempts(code);
  }

  hasPendingRetry(code: string): boolean {
    return this.scheduler.hasPending(code);
  }

  logSystemInfo(): void {
    this.logLine(formatSystemInfoEntry(formatSystemInfo(this.collectDevice())), "low");
  }

  /** Called with the error when one is presented, undefined when dismissed */
  onPresentationChange(listener: PresentationListener): () => void {
    this.presentationListeners.add(listener);
    return () => {
      this.presentationListeners.delete(listener);
    };
  }

  /**
   * Cancel every pending retry, clear the presentation and wait for the log
   * sink. Results of retry operations still running are discarded.
   */
  async shutdown(): Promise<void> {
    this.epoch++;
    this.scheduler.cancelAll();
    this.setPresented(undefined);
    try {
      await this.config.logSink.flush();
    } catch (error) {
      logWarn(TAG, `Log flush failed: ${describeThrown(error)}`);
    }
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  /** Log and keep `error` in the history; returns the new entry's id */
  private record(error: AppError, context: ErrorContext | undefined): string {
    const timestamp = this.config.clock.now();
    const suffix =
      error.severity === "critical" ? formatDeviceSuffix(this.collectDevice()) : "";
    this.logLine(formatHandledError(error, context), error.severity, suffix);

    this.sequence++;
    const id = `${error.code}-${timestamp}-${this.sequence}`;
    this.history.push({
      id,
      errorCode: error.code,
      severity: error.severity,
      category: error.category,
      message: this.sanitize(error.message),
      timestamp,
      ...(context ? { contextOperation: context.operation } : {}),
      wasRetried: false,
    });

    this.safely("metrics", () => recordErrorHandled(error.code, error.category, error.severity));
    return id;
  }

  private scheduleAutoRetry(
    error: AppError,
    context: ErrorContext,
    operation: RetryOperation,
    entryId: string,
  ): HandleOutcome {
    const code = error.code;
    const result = this.scheduler.scheduleAutoRetry(
      code,
      () => {
        this.executeRetry(code, context, operation, entryId);
      },
      operation,
    );

    if (result.status === "exhausted") {
      this.logLine(formatRetryExhausted(code, result.attempts), "medium");
      this.setPresented(error);
      return "retry-exhausted";
    }

    this.logLine(formatRetryAttempt(code, result.attempt, result.delayMs), "medium");
    this.safely("metrics", () => recordRetryScheduled(code));
    return "retry-scheduled";
  }

  private scheduleUserRetry(
    error: AppError,
    context: ErrorContext | undefined,
    delayMs: number,
  ): void {
    this.setPresented(undefined);
    const operation = context?.retryOperation;
    if (!operation) {
      const missing = new AppError({
        type: "configurationError",
        details: `No retry operation provided for ${context?.operation ?? error.code}`,
      });
      this.logLine(formatHandledError(missing, context), missing.severity);
      return;
    }

    const code = error.code;
    const attempt = this.scheduler.scheduleManual(
      code,
      delayMs,
      () => {
        this.executeRetry(code, context, operation, this.lastEntryId(code));
      },
      operation,
    );
    if (delayMs > 0) {
      this.logLine(formatRetryAttempt(code, attempt, delayMs), "medium");
    }
    this.safely("metrics", () => recordRetryScheduled(code));
  }

  /** Marks history entry `entryId` as retried, then runs the operation */
  private executeRetry(
    code: string,
    context: ErrorContext | undefined,
    operation: RetryOperation,
    entryId: string | undefined,
  ): void {
    this.history.updateLast(
      (entry) => entry.id === entryId,
      (entry) => ({ ...entry, wasRetried: true }),
    );
    void this.runRetryOperation(code, context, operation, entryId);
  }

  private async runRetryOperation(
    code: string,
    context: ErrorContext | undefined,
    operation: RetryOperation,
    entryId: string | undefined,
  ): Promise<void> {
    const epoch = this.epoch;
    let failure: { readonly error: unknown } | undefined;
    try {
      await operation();
    } catch (error) {
      failure = { error };
    }

    if (epoch !== this.epoch) {
      return;
    }

    if (failure) {
      this.recordOutcome(code, entryId, "failed");
      this.handle(failure.error, context);
      return;
    }

    this.scheduler.recordSuccess(code);
    this.recordOutcome(code, entryId, "succeeded");
    this.logLine(formatRetrySuccess(code), "low");
  }

  private recordOutcome(code: string, entryId: string | undefined, outcome: RetryOutcome): void {
    this.history.updateLast(
      (entry) => entry.id === entryId,
      (entry) => ({ ...entry, retryOutcome: outcome }),
    );
    this.safely("metrics", () => recordRetryOutcome(code, outcome));
  }

  private lastEntryId(code: string): string | undefined {
    const entries = this.history.toArray();
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry?.errorCode === code) return entry.id;
    }
    return undefined;
  }

  private setPresented(error: AppError | undefined): void {
    if (this._currentError === error) {
      return;
    }
    this._currentError = error;
    for (const listener of this.presentationListeners) {
      this.safely("presentation listener", () => listener(error));
    }
  }

  private reportCrash(error: AppError, context: ErrorContext | undefined): void {
    const report: CrashReport = {
      error,
      timestamp: this.config.clock.now(),
      device: this.collectDevice(),
      ...(context ? { context } : {}),
    };
    try {
      void Promise.resolve(this.config.crashReporter.report(report)).catch((reason: unknown) => {
        logWarn(TAG, `Crash report failed: ${describeThrown(reason)}`);
      });
    } catch (reason) {
      logWarn(TAG, `Crash report failed: ${describeThrown(reason)}`);
    }
  }

  private collectDevice(): DeviceInfo {
    try {
      return this.config.deviceInfo.collect();
    } catch (error) {
      logWarn(TAG, `Device info unavailable: ${describeThrown(error)}`);
      return { model: "unknown", osVersion: "unknown", appVersion: this.config.appVersion };
    }
  }

  private sanitize(text: string): string {
    try {
      return this.config.sanitizer.sanitize(text);
    } catch (error) {
      logWarn(TAG, `Sanitizer failed: ${describeThrown(error)}`);
      return REDACTED_TEXT;
    }
  }

  private logLine(message: string, severity: ErrorSeverity, suffix = ""): void {
    const line = this.sanitize(message) + suffix;
    try {
      this.config.logSink.append(line, severity);
    } catch (error) {
      logWarn(TAG, `Failed to write log entry: ${describeThrown(error)}`);
    }
  }

  private safely(label: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      logWarn(TAG, `${label} failed: ${describeThrown(error)}`);
    }
  }
}
