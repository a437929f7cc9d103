export const DEFAULT_MAX_ATTEMPTS = 3;

export const DEFAULT_BASE_DELAY_MS = 2_000;

export const DEFAULT_HISTORY_CAPACITY = 100;

export const DEFAULT_APP_VERSION = "unknown";

export const DAY_MS = 24 * 60 * 60 * 1000;

export const WEEK_MS = 7 * DAY_MS;
