/** Placeholders written in place of redacted spans */
export const PLACEHOLDERS = {
  path: "[PATH]",
  email: "[EMAIL]",
  userId: "[USER_ID]",
  largeNumber: "[LARGE_NUMBER]",
} as const;

/** Written instead of the whole text when a rule fails */
export const REDACTED_TEXT = "[REDACTED]";
