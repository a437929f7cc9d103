/**
 * Fallback diagnostics channel.
 *
 * Used when the subsystem's own machinery (file log, crash reporter,
 * listeners) fails. Never throws.
 */

/**
 * Log a warning with a consistent format: [tag] message
 */
export function logWarn(tag: string, message: string): void {
  try {
    console.warn(`[${tag}] ${message}`);
  } catch {
    // stderr unavailable; nothing left to report to
  }
}

/**
 * Extract a printable reason from a thrown value.
 */
export function describeThrown(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
