import type { ErrorCategory, ErrorSeverity } from "@lumen/errors";
import { DAY_MS, WEEK_MS } from "./constants.js";
import type { ErrorLogEntry, ErrorStatistics } from "./types.js";

/**
 * Derive statistics from a history snapshot. Pure; called on every request
 * so counts always match the history.
 */
export function computeStatistics(
  entries: readonly ErrorLogEntry[],
  nowMs: number,
): ErrorStatistics {
  const errorsByCategory: Record<ErrorCategory, number> = {
    network: 0,
    storage: 0,
    model: 0,
    gpu: 0,
    memory: 0,
    user: 0,
    system: 0,
    chat: 0,
    export: 0,
  };
  const errorsBySeverity: Record<ErrorSeverity, number> = {
    low: 0,
    medium: 0,
    high: 0,
    critical: 0,
  };
  const codeCounts = new Map<string, number>();
  let errorsLast24Hours = 0;
  let errorsLast7Days = 0;
  let retried = 0;
  let succeeded = 0;

  for (const entry of entries) {
    const age = nowMs - entry.timestamp;
    if (age <= DAY_MS) errorsLast24Hours++;
    if (age <= WEEK_MS) errorsLast7Days++;

    errorsByCategory[entry.category]++;
    errorsBySeverity[entry.severity]++;
    codeCounts.set(entry.errorCode, (codeCounts.get(entry.errorCode) ?? 0) + 1);

    if (entry.wasRetried) {
      retried++;
      if (entry.retryOutcome === "succeeded") succeeded++;
    }
  }

  // Map iteration follows insertion order, so ties go to the first-seen code
  let mostCommonError: string | undefined;
  let best = 0;
  for (const [code, count] of codeCounts) {
    if (count > best) {
      best = count;
      mostCommonError = code;
    }
  }

  return {
    totalErrors: entries.length,
    errorsLast24Hours,
    errorsLast7Days,
    errorsByCategory,
    errorsBySeverity,
    ...(mostCommonError === undefined ? {} : { mostCommonError }),
    retrySuccessRate: retried === 0 ? 0 : succeeded / retried,
  };
}
