export const PACKAGE_NAME = "@lumen/log-store" as const;

export {
  type LogStoreConfig,
  LogStoreConfigSchema,
  type ResolvedLogStoreConfig,
  resolveLogStoreConfig,
} from "./config.js";
export {
  DEFAULT_FILE_PREFIX,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  DEFAULT_MAX_FILES,
  DEFAULT_RECENT_LIMIT,
  EXPORT_FILE_PREFIX,
} from "./constants.js";
export { formatLogLine, LogStore } from "./log-store.js";
export type { LogSink } from "./types.js";
