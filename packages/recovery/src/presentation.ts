/**
 * Presentation model for a handled error: the data an alert or toast needs,
 * without rendering it.
 */

import {
  actionDescription,
  actionTitle,
  type AppError,
  CATEGORY_TITLES,
  type ErrorCategory,
  type ErrorSeverity,
  type RecoveryAction,
  SEVERITY_TITLES,
} from "@lumen/errors";
import type { DeviceInfo } from "./device-info.js";

export const ALERT_TITLES: Readonly<Record<ErrorCategory, string>> = {
  network: "Connection Problem",
  storage: "Storage Issue",
  model: "Model Problem",
  gpu: "Performance Issue",
  memory: "Memory Issue",
  user: "Input Error",
  system: "System Error",
  chat: "Chat Error",
  export: "Export Error",
};

export const TOAST_TITLES: Readonly<Record<ErrorSeverity, string>> = {
  low: "Notice",
  medium: "Warning",
  high: "Error",
  critical: "Critical Error",
};

export interface PresentedAction {
  readonly action: RecoveryAction;
  readonly title: string;
  readonly description: string;
}

export interface ErrorPresentation {
  readonly title: string;
  readonly message: string;
  readonly code: string;
  readonly severity: ErrorSeverity;
  readonly category: ErrorCategory;
  readonly actions: readonly PresentedAction[];
}

export function describeError(error: AppError): ErrorPresentation {
  return {
    title: ALERT_TITLES[error.category],
    message: error.message,
    code: error.code,
    severity: error.severity,
    category: error.category,
    actions: error.recoveryActions.map((action) => ({
      action,
      title: actionTitle(action),
      description: actionDescription(action),
    })),
  };
}

/** Text attached to a support request */
export function buildSupportDiagnostics(
  error: AppError,
  timestampMs: number,
  device: DeviceInfo,
): string {
  return [
    `Error Code: ${error.code}`,
    `Category: ${CATEGORY_TITLES[error.category]}`,
    `Severity: ${SEVERITY_TITLES[error.severity]}`,
    `Message: ${error.message}`,
    `Timestamp: ${new Date(timestampMs).toISOString()}`,
    "",
    `Device: ${device.model}`,
    `OS Version: ${device.osVersion}`,
    `App Version: ${device.appVersion}`,
  ].join("\n");
}
