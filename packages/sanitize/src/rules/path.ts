import { PLACEHOLDERS } from "../constants.js";
import type { RedactionRule } from "../types.js";
import { createPatternRule } from "./utils.js";

/**
 * Absolute or home-relative paths with at least two components, e.g.
 * `/Users/a/Documents/f.txt` or `~/Library/Caches`.
 *
 * A path must start the text or follow whitespace, a quote, an opening
 * bracket, `=`, `:` or `,`; this leaves `and/or` and URL hosts alone.
 * Components stop at whitespace, quotes, brackets, `,`, `|` and `<>`.
 */
const PATH_PATTERN = /(?<![^\s"'(\[{=:,])~?(?:\/[^/\s"'()[\]{}<>,|]+){2,}\/?/g;

export const pathRule: RedactionRule = createPatternRule(
  "path",
  "Redact filesystem paths with two or more components",
  PATH_PATTERN,
  PLACEHOLDERS.path,
);

export const PATH_RULES: readonly RedactionRule[] = [pathRule];
