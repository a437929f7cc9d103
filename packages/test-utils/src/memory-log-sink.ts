import type { ErrorSeverity } from "@lumen/errors";

export interface MemoryLogEntry {
  readonly message: string;
  readonly severity: ErrorSeverity;
}

/**
 * Log sink that keeps entries in memory
 */
export class MemoryLogSink {
  readonly entries: MemoryLogEntry[] = [];
  flushCount = 0;

  append(message: string, severity: ErrorSeverity): void {
    this.entries.push({ message, severity });
  }

  async flush(): Promise<void> {
    this.flushCount += 1;
  }

  messages(): string[] {
    return this.entries.map((e) => e.message);
  }

  /** Messages starting with `prefix`, e.g. "RETRY_ATTEMPT:" */
  withPrefix(prefix: string): string[] {
    return this.messages().filter((m) => m.startsWith(prefix));
  }

  clear(): void {
    this.entries.length = 0;
  }
}
