/**
 * ErrorCoordinator configuration
 */

import { type Clock, defaultClock } from "@lumen/core";
import { AppError } from "@lumen/errors";
import type { LogSink } from "@lumen/log-store";
import { LogSanitizer, type TextSanitizer } from "@lumen/sanitize";
import { z } from "zod";
import {
  DEFAULT_APP_VERSION,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_HISTORY_CAPACITY,
  DEFAULT_MAX_ATTEMPTS,
} from "./constants.js";
import { type CrashReporter, createTracingCrashReporter } from "./crash-reporter.js";
import { createNodeDeviceInfoProvider, type DeviceInfoProvider } from "./device-info.js";
import { RecoveryRequestBus } from "./requests.js";

export const RecoveryConfigSchema = z.object({
  /** Automatic retries per error code before the error is shown (default: 3) */
  maxAttempts: z.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),

  /** First backoff delay; doubles per attempt (default: 2000ms) */
  baseDelayMs: z.number().int().positive().default(DEFAULT_BASE_DELAY_MS),

  /** Handled errors kept in memory (default: 100) */
  historyCapacity: z.number().int().positive().default(DEFAULT_HISTORY_CAPACITY),

  /** Reported in support diagnostics and system info */
  appVersion: z.string().min(1).default(DEFAULT_APP_VERSION),
});

export type RecoveryConfig = z.input<typeof RecoveryConfigSchema> & {
  /** Destination of every log line, usually a LogStore */
  readonly logSink: LogSink;
  readonly clock?: Clock;
  readonly sanitizer?: TextSanitizer;
  readonly crashReporter?: CrashReporter;
  readonly deviceInfo?: DeviceInfoProvider;
  readonly requests?: RecoveryRequestBus;
};

export type ResolvedRecoveryConfig = z.output<typeof RecoveryConfigSchema> & {
  readonly logSink: LogSink;
  readonly clock: Clock;
  readonly sanitizer: TextSanitizer;
  readonly crashReporter: CrashReporter;
  readonly deviceInfo: DeviceInfoProvider;
  readonly requests: RecoveryRequestBus;
};

export function resolveRecoveryConfig(config: RecoveryConfig): ResolvedRecoveryConfig {
  const result = RecoveryConfigSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new AppError({ type: "configurationError", details: `Invalid recovery config: ${details}` });
  }
  const data = result.data;
  return {
    ...data,
    logSink: config.logSink,
    clock: config.clock ?? defaultClock,
    sanitizer: config.sanitizer ?? new LogSanitizer(),
    crashReporter: config.crashReporter ?? createTracingCrashReporter(),
    deviceInfo: config.deviceInfo ?? createNodeDeviceInfoProvider(data.appVersion),
    requests: config.requests ?? new RecoveryRequestBus(),
  };
}
