/**
 * Message shapes the coordinator writes to the log sink.
 *
 * Every message passes through the sanitizer before it is written; the
 * device suffix for critical errors is added after sanitizing so the model
 * and OS version survive verbatim.
 */

import { describeThrown } from "@lumen/core";
import { actionTitle, type AppError, CATEGORY_TITLES, type RecoveryAction, SEVERITY_TITLES } from "@lumen/errors";
import type { DeviceInfo } from "./device-info.js";
import type { ErrorContext } from "./types.js";

/** `[CODE] | [Category] | [Severity] | message | Operation: op | ...` */
export function formatHandledError(error: AppError, context?: ErrorContext): string {
  const parts = [
    `[${error.code}]`,
    `[${CATEGORY_TITLES[error.category]}]`,
    `[${SEVERITY_TITLES[error.severity]}]`,
    error.message,
  ];

  if (context) {
    parts.push(`Operation: ${context.operation}`);
    const params = Object.entries(context.parameters ?? {});
    if (params.length > 0) {
      parts.push(`Parameters: {${params.map(([key, value]) => `${key}=${String(value)}`).join(", ")}}`);
    }
  }

  if (error.cause !== undefined) {
    parts.push(`Underlying: ${describeThrown(error.cause)}`);
  }

  return parts.join(" | ");
}

/** Appended to critical entries after sanitizing */
export function formatDeviceSuffix(device: DeviceInfo): string {
  return ` | Device: ${device.model} | OS: ${device.osVersion}`;
}

export function formatRetryAttempt(code: string, attempt: number, delayMs: number): string {
  return `RETRY_ATTEMPT: [${code}] Attempt ${attempt} after ${delayMs / 1000}s delay`;
}

export function formatRetrySuccess(code: string): string {
  return `RETRY_SUCCESS: [${code}] Operation succeeded after retry`;
}

export function formatRetryExhausted(code: string, attempts: number): string {
  return `RETRY_EXHAUSTED: [${code}] Giving up after ${attempts} attempts`;
}

export function formatRecoveryAction(code: string, action: RecoveryAction): string {
  return `RECOVERY_ACTION: [${code}] Executing '${actionTitle(action)}'`;
}

export function formatCriticalError(error: AppError): string {
  return `CRITICAL_ERROR: [${error.code}] ${error.message}`;
}

export function formatSystemInfoEntry(summary: string): string {
  return `SYSTEM_INFO: ${summary}`;
}
