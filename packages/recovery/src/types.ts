import type { ErrorCategory, ErrorSeverity } from "@lumen/errors";

/** Re-runs the failed operation. Throwing (or rejecting) counts as failure. */
export type RetryOperation = () => Promise<void> | void;

export type ParameterValue = string | number | boolean;

/** Call-site information supplied with an error */
export interface ErrorContext {
  readonly operation: string;
  readonly parameters?: Readonly<Record<string, ParameterValue>>;
  readonly retryOperation?: RetryOperation;
}

export type RetryOutcome = "succeeded" | "failed";

/** One handled error in the in-memory history */
export interface ErrorLogEntry {
  readonly id: string;
  readonly errorCode: string;
  readonly severity: ErrorSeverity;
  readonly category: ErrorCategory;
  readonly message: string;
  /** Epoch milliseconds (UTC) */
  readonly timestamp: number;
  readonly contextOperation?: string;
  readonly wasRetried: boolean;
  /** Set once a retry started for this entry has finished */
  readonly retryOutcome?: RetryOutcome;
}

/** What `handle()` decided */
export type HandleOutcome =
  /** Shown to the user */
  | "presented"
  /** Shown to the user because the retry ceiling was reached */
  | "retry-exhausted"
  /** Retried silently after a backoff delay */
  | "retry-scheduled"
  /** Log only */
  | "logged";

export interface ErrorStatistics {
  readonly totalErrors: number;
  readonly errorsLast24Hours: number;
  readonly errorsLast7Days: number;
  readonly errorsByCategory: Readonly<Record<ErrorCategory, number>>;
  readonly errorsBySeverity: Readonly<Record<ErrorSeverity, number>>;
  readonly mostCommonError?: string;
  /** Retried entries that succeeded / all retried entries; 0 when none were retried */
  readonly retrySuccessRate: number;
}
