import type { RedactionRule } from "../types.js";
import { emailRule, IDENTIFIER_RULES, largeNumberRule, userIdRule } from "./identifiers.js";
import { PATH_RULES, pathRule } from "./path.js";

/** Default rules in required execution order: path, email, user id, large number */
export const DEFAULT_RULES: readonly RedactionRule[] = [...PATH_RULES, ...IDENTIFIER_RULES];

export { emailRule, IDENTIFIER_RULES, largeNumberRule, PATH_RULES, pathRule, userIdRule };
