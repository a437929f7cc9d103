import { PLACEHOLDERS } from "../constants.js";
import type { RedactionRule } from "../types.js";
import { createPatternRule } from "./utils.js";

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

const USER_ID_PATTERN = /\buser_\w+/g;

/** Account numbers, phone numbers, device serials */
const LARGE_NUMBER_PATTERN = /\b\d{10,}\b/g;

export const emailRule: RedactionRule = createPatternRule(
  "email",
  "Redact email addresses",
  EMAIL_PATTERN,
  PLACEHOLDERS.email,
);

export const userIdRule: RedactionRule = createPatternRule(
  "user-id",
  "Redact user_<token> identifiers",
  USER_ID_PATTERN,
  PLACEHOLDERS.userId,
);

export const largeNumberRule: RedactionRule = createPatternRule(
  "large-number",
  "Redact digit runs of ten or more",
  LARGE_NUMBER_PATTERN,
  PLACEHOLDERS.largeNumber,
);

export const IDENTIFIER_RULES: readonly RedactionRule[] = [emailRule, userIdRule, largeNumberRule];
