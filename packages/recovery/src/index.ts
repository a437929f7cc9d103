/**
 * @lumen/recovery
 *
 * Error coordination: severity routing, bounded automatic retry with
 * exponential backoff, history, statistics and recovery requests.
 */

export const PACKAGE_NAME = "@lumen/recovery" as const;

// Configuration
export {
  type RecoveryConfig,
  RecoveryConfigSchema,
  type ResolvedRecoveryConfig,
  resolveRecoveryConfig,
} from "./config.js";
export {
  DAY_MS,
  DEFAULT_APP_VERSION,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_HISTORY_CAPACITY,
  DEFAULT_MAX_ATTEMPTS,
  WEEK_MS,
} from "./constants.js";

// Core
export { ErrorCoordinator, type PresentationListener } from "./coordinator.js";
export { RetryScheduler, type RetrySchedulerOptions, type ScheduleResult } from "./retry-scheduler.js";
export { RingBuffer } from "./ring-buffer.js";
export { computeStatistics } from "./statistics.js";

// Collaborators
export { type CrashReport, type CrashReporter, createTracingCrashReporter } from "./crash-reporter.js";
export {
  createNodeDeviceInfoProvider,
  type DeviceInfo,
  type DeviceInfoProvider,
  formatBytes,
  formatSystemInfo,
} from "./device-info.js";
export { RecoveryRequestBus, type RecoveryRequestEvents, type RecoveryRequestName } from "./requests.js";

// Presentation and log lines
export {
  formatCriticalError,
  formatDeviceSuffix,
  formatHandledError,
  formatRecoveryAction,
  formatRetryAttempt,
  formatRetryExhausted,
  formatRetrySuccess,
  formatSystemInfoEntry,
} from "./log-message.js";
export {
  ALERT_TITLES,
  buildSupportDiagnostics,
  describeError,
  type ErrorPresentation,
  type PresentedAction,
  TOAST_TITLES,
} from "./presentation.js";

// Metrics
export {
  getErrorsHandledCounter,
  getRecoveryActionCounter,
  getRetriesScheduledCounter,
  getRetryOutcomeCounter,
} from "./metrics.js";

// Types
export type {
  ErrorContext,
  ErrorLogEntry,
  ErrorStatistics,
  HandleOutcome,
  ParameterValue,
  RetryOperation,
  RetryOutcome,
} from "./types.js";
