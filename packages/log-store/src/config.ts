/**
 * LogStore configuration
 */

import { type Clock, defaultClock } from "@lumen/core";
import { AppError } from "@lumen/errors";
import { z } from "zod";
import {
  DEFAULT_FILE_PREFIX,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  DEFAULT_MAX_FILES,
} from "./constants.js";

export const LogStoreConfigSchema = z.object({
  /** Directory holding the log files; created on first write */
  directory: z.string().min(1),

  /** Size of the current day's file that triggers rotation (default: 10 MiB) */
  maxFileSizeBytes: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE_BYTES),

  /** Number of log files kept after rotation (default: 5) */
  maxFiles: z.number().int().positive().default(DEFAULT_MAX_FILES),

  /** File name prefix, followed by YYYY-MM-DD.log (default: "error-") */
  filePrefix: z
    .string()
    .regex(/^[A-Za-z0-9._-]*$/, "may only contain letters, digits, '.', '_' and '-'")
    .default(DEFAULT_FILE_PREFIX),
});

export type LogStoreConfig = z.input<typeof LogStoreConfigSchema> & {
  /** Source of entry timestamps and file dates */
  readonly clock?: Clock;
};

export type ResolvedLogStoreConfig = z.output<typeof LogStoreConfigSchema> & {
  readonly clock: Clock;
};

export function resolveLogStoreConfig(config: LogStoreConfig): ResolvedLogStoreConfig {
  const result = LogStoreConfigSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new AppError({ type: "configurationError", details: `Invalid log store config: ${details}` });
  }
  return { ...result.data, clock: config.clock ?? defaultClock };
}
