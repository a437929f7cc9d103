/** 10 MiB */
export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;

export const DEFAULT_MAX_FILES = 5;

export const DEFAULT_FILE_PREFIX = "error-";

export const DEFAULT_RECENT_LIMIT = 100;

export const EXPORT_FILE_PREFIX = "exported-logs-";
