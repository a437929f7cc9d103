/**
 * OTel metrics for error handling.
 *
 * Lazily initialized: instruments are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";
import type { ErrorCategory, ErrorSeverity, RecoveryActionType } from "@lumen/errors";
import type { RetryOutcome } from "./types.js";

const METER_NAME = "lumen.recovery";

let _errorsHandled: Counter | undefined;
let _retriesScheduled: Counter | undefined;
let _retryOutcomes: Counter | undefined;
let _recoveryActions: Counter | undefined;

export function getErrorsHandledCounter(): Counter {
  if (_errorsHandled === undefined) {
    _errorsHandled = metrics.getMeter(METER_NAME).createCounter("lumen.errors.handled", {
      description: "Errors submitted to the coordinator, by code, category and severity",
    });
  }
  return _errorsHandled;
}

export function getRetriesScheduledCounter(): Counter {
  if (_retriesScheduled === undefined) {
    _retriesScheduled = metrics.getMeter(METER_NAME).createCounter("lumen.retries.scheduled", {
      description: "Automatic and manual retries scheduled",
    });
  }
  return _retriesScheduled;
}

export function getRetryOutcomeCounter(): Counter {
  if (_retryOutcomes === undefined) {
    _retryOutcomes = metrics.getMeter(METER_NAME).createCounter("lumen.retries.outcome", {
      description: "Finished retry operations by outcome",
    });
  }
  return _retryOutcomes;
}

export function getRecoveryActionCounter(): Counter {
  if (_recoveryActions === undefined) {
    _recoveryActions = metrics.getMeter(METER_NAME).createCounter("lumen.recovery.actions", {
      description: "Recovery actions executed, by action",
    });
  }
  return _recoveryActions;
}

export function recordErrorHandled(
  code: string,
  category: ErrorCategory,
  severity: ErrorSeverity,
): void {
  getErrorsHandledCounter().add(1, { code, category, severity });
}

export function recordRetryScheduled(code: string): void {
  getRetriesScheduledCounter().add(1, { code });
}

export function recordRetryOutcome(code: string, outcome: RetryOutcome): void {
  getRetryOutcomeCounter().add(1, { code, outcome });
}

export function recordRecoveryAction(action: RecoveryActionType): void {
  getRecoveryActionCounter().add(1, { action });
}
