/**
 * LogStore - Day-partitioned diagnostic log with count-based rotation
 *
 * - One file per UTC day: <prefix>YYYY-MM-DD.log
 * - Lines: [ISO-8601 timestamp] [SEVERITY] message
 * - Rotation: once the current day's file exceeds the size ceiling, the
 *   oldest files (by creation time) are deleted until maxFiles remain
 * - Single writer queue: writes, reads and maintenance run one at a time
 *   in submission order
 * - Best effort: I/O failures go to the fallback channel and never reach
 *   the caller
 */

import { appendFile, mkdir, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describeThrown, logWarn } from "@lumen/core";
import type { ErrorSeverity } from "@lumen/errors";
import { type LogStoreConfig, type ResolvedLogStoreConfig, resolveLogStoreConfig } from "./config.js";
import { DEFAULT_RECENT_LIMIT, EXPORT_FILE_PREFIX } from "./constants.js";
import type { LogSink } from "./types.js";

const TAG = "@lumen/log-store";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Format one log line, newline-terminated. Embedded line breaks are escaped. */
export function formatLogLine(timestampMs: number, severity: ErrorSeverity, message: string): string {
  const flat = message.replace(/\r?\n/g, "\\n");
  return `[${new Date(timestampMs).toISOString()}] [${severity.toUpperCase()}] ${flat}\n`;
}

export class LogStore implements LogSink {
  private readonly config: ResolvedLogStoreConfig;
  private readonly fileNamePattern: RegExp;
  private queue: Promise<void> = Promise.resolve();
  private directoryReady = false;
  private closed = false;

  constructor(config: LogStoreConfig) {
    this.config = resolveLogStoreConfig(config);
    this.fileNamePattern = new RegExp(
      `^${escapeRegExp(this.config.filePrefix)}\\d{4}-\\d{2}-\\d{2}\\.log$`,
    );
  }

  get directory(): string {
    return this.config.directory;
  }

  /** File name for the UTC day containing `timestampMs` */
  fileNameFor(timestampMs: number): string {
    return `${this.config.filePrefix}${new Date(timestampMs).toISOString().slice(0, 10)}.log`;
  }

  /**
   * Queue a line for writing. Returns immediately; the timestamp is taken
   * now, not when the write runs.
   */
  append(message: string, severity: ErrorSeverity): void {
    if (this.closed) {
      logWarn(TAG, "Dropped log entry written after close");
      return;
    }
    const timestampMs = this.config.clock.now();
    void this.enqueue("append", () => this.write(timestampMs, severity, message), undefined);
  }

  /**
   * Most recent lines across all files, newest file first and newest line
   * first within a file. Never more than `limit`, floored; a non-finite
   * limit reads nothing.
   */
  getRecent(limit: number = DEFAULT_RECENT_LIMIT): Promise<string[]> {
    const max = Number.isFinite(limit) ? Math.floor(limit) : 0;
    if (max <= 0) {
      return Promise.resolve([]);
    }
    return this.enqueue(
      "getRecent",
      async () => {
        const lines: string[] = [];
        const files = (await this.listLogFiles()).reverse();
        for (const file of files) {
          const content = await this.readOrEmpty(file);
          const fileLines = content.split("\n").filter((line) => line.length > 0);
          for (let i = fileLines.length - 1; i >= 0; i--) {
            const line = fileLines[i];
            if (line === undefined) continue;
            lines.push(line);
            if (lines.length >= max) {
              return lines;
            }
          }
        }
        return lines;
      },
      [],
    );
  }

  /** All log files concatenated in name order under `=== name ===` headers */
  exportText(): Promise<string> {
    return this.enqueue("exportText", () => this.buildExport(), "");
  }

  /**
   * Write the export artifact to `destination` (default
   * `<directory>/exported-logs-<epochMs>.txt`). Resolves to the path
   * written, or undefined if the export failed.
   */
  export(destination?: string): Promise<string | undefined> {
    return this.enqueue<string | undefined>(
      "export",
      async () => {
        const text = await this.buildExport();
        const target =
          destination ??
          join(this.config.directory, `${EXPORT_FILE_PREFIX}${this.config.clock.now()}.txt`);
        if (destination === undefined) {
          await this.ensureDirectory();
        }
        await writeFile(target, text, "utf-8");
        return target;
      },
      undefined,
    );
  }

  /** Delete every log file. Export artifacts and foreign files are kept. */
  clear(): Promise<void> {
    return this.enqueue(
      "clear",
      async () => {
        for (const file of await this.listLogFiles()) {
          await rm(join(this.config.directory, file), { force: true });
        }
      },
      undefined,
    );
  }

  /** Names of the current log files, oldest day first */
  listFiles(): Promise<string[]> {
    return this.enqueue("listFiles", () => this.listLogFiles(), []);
  }

  /** Resolves once every operation queued so far has finished */
  flush(): Promise<void> {
    return this.queue;
  }

  /** Stop accepting entries and wait for queued work */
  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private enqueue<T>(label: string, work: () => Promise<T>, fallback: T): Promise<T> {
    const next = this.queue.then(work).catch((error: unknown) => {
      logWarn(TAG, `${label} failed: ${describeThrown(error)}`);
      return fallback;
    });
    this.queue = next.then(() => undefined);
    return next;
  }

  private async write(timestampMs: number, severity: ErrorSeverity, message: string): Promise<void> {
    await this.ensureDirectory();
    const file = join(this.config.directory, this.fileNameFor(timestampMs));
    await appendFile(file, formatLogLine(timestampMs, severity, message), "utf-8");
    await this.rotateIfNeeded(file);
  }

  private async ensureDirectory(): Promise<void> {
    if (this.directoryReady) {
      return;
    }
    await mkdir(this.config.directory, { recursive: true });
    this.directoryReady = true;
  }

  private async rotateIfNeeded(currentFile: string): Promise<void> {
    const current = await stat(currentFile);
    if (current.size <= this.config.maxFileSizeBytes) {
      return;
    }

    const files: { name: string; createdMs: number }[] = [];
    for (const name of await this.listLogFiles()) {
      try {
        const fileStat = await stat(join(this.config.directory, name));
        files.push({ name, createdMs: fileStat.birthtimeMs });
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
    }
    files.sort((a, b) => a.createdMs - b.createdMs || a.name.localeCompare(b.name));

    while (files.length > this.config.maxFiles) {
      const oldest = files.shift();
      if (!oldest) {
        break;
      }
      await rm(join(this.config.directory, oldest.name), { force: true });
    }
  }

  private async listLogFiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.config.directory);
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }
    return entries.filter((entry) => this.fileNamePattern.test(entry)).sort();
  }

  private async readOrEmpty(name: string): Promise<string> {
    try {
      return await readFile(join(this.config.directory, name), "utf-8");
    } catch (error) {
      if (!isMissing(error)) {
        logWarn(TAG, `Skipping unreadable log file ${name}: ${describeThrown(error)}`);
      }
      return "";
    }
  }

  private async buildExport(): Promise<string> {
    let text = "";
    for (const file of await this.listLogFiles()) {
      text += `=== ${file} ===\n${await this.readOrEmpty(file)}\n\n`;
    }
    return text;
  }
}
