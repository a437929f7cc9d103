export const PACKAGE_NAME = "@lumen/sanitize" as const;

// Constants
export { PLACEHOLDERS, REDACTED_TEXT } from "./constants.js";

// Rules
export {
  DEFAULT_RULES,
  emailRule,
  IDENTIFIER_RULES,
  largeNumberRule,
  PATH_RULES,
  pathRule,
  userIdRule,
} from "./rules/index.js";
export { createPatternRule } from "./rules/utils.js";
// Core
export { LogSanitizer } from "./sanitizer.js";
// Types
export type {
  LogSanitizerConfig,
  Redaction,
  RedactionRule,
  SanitizeResult,
  TextSanitizer,
} from "./types.js";
