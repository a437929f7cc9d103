/**
 * Crash reporting for critical errors.
 *
 * The coordinator hands every critical error to a CrashReporter and does not
 * wait for it. The default reporter records the error as an exception on an
 * OpenTelemetry span; with no tracer provider registered the span is a no-op.
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import type { AppError } from "@lumen/errors";
import type { DeviceInfo } from "./device-info.js";
import type { ErrorContext } from "./types.js";

const TRACER_NAME = "lumen";

export interface CrashReport {
  readonly error: AppError;
  readonly context?: ErrorContext;
  /** Epoch milliseconds (UTC) */
  readonly timestamp: number;
  readonly device: DeviceInfo;
}

export interface CrashReporter {
  report(report: CrashReport): void | Promise<void>;
}

export function createTracingCrashReporter(): CrashReporter {
  return {
    report({ error, context, timestamp, device }) {
      const span = trace.getTracer(TRACER_NAME).startSpan("lumen.crash_report", {
        startTime: timestamp,
        attributes: {
          "error.code": error.code,
          "error.category": error.category,
          "error.severity": error.severity,
          "device.model": device.model,
          "os.version": device.osVersion,
          "app.version": device.appVersion,
          ...(context ? { "error.operation": context.operation } : {}),
        },
      });
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      span.end();
    },
  };
}
