import type { ErrorSeverity } from "@lumen/errors";

/**
 * Destination for diagnostic log lines.
 *
 * `append` must return without waiting for I/O and must not throw;
 * `flush` resolves once everything appended so far is durable.
 */
export interface LogSink {
  append(message: string, severity: ErrorSeverity): void;
  flush(): Promise<void>;
}
