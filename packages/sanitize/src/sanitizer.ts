import { describeThrown, logWarn } from "@lumen/core";
import { AppError } from "@lumen/errors";
import { REDACTED_TEXT } from "./constants.js";
import { DEFAULT_RULES } from "./rules/index.js";
import type {
  LogSanitizerConfig,
  Redaction,
  RedactionRule,
  SanitizeResult,
  TextSanitizer,
} from "./types.js";

const PLACEHOLDER_PATTERN = /^\[[A-Z_]+\]$/;

/**
 * Redacts personal data from log text.
 *
 * Rules run in order, each over the output of the previous one. The
 * result is stable under repeated application. If a rule throws, the
 * whole text is replaced with {@link REDACTED_TEXT} rather than written
 * unredacted.
 */
export class LogSanitizer implements TextSanitizer {
  private readonly rules: readonly RedactionRule[];

  constructor(config?: LogSanitizerConfig) {
    this.rules = config?.rules ?? DEFAULT_RULES;

    const issues: string[] = [];
    if (this.rules.length === 0) {
      issues.push("rules array must not be empty");
    }
    for (const rule of this.rules) {
      if (!rule.name) {
        issues.push("each rule must have a non-empty name");
      }
      if (!PLACEHOLDER_PATTERN.test(rule.placeholder)) {
        issues.push(`rule '${rule.name}' placeholder must look like [UPPER_CASE]`);
      }
    }
    for (const rule of this.rules) {
      for (const other of this.rules) {
        if (rule.find(other.placeholder).length > 0) {
          issues.push(`rule '${rule.name}' matches placeholder ${other.placeholder}`);
        }
      }
    }
    if (issues.length > 0) {
      throw new AppError({
        type: "configurationError",
        details: `Invalid sanitizer configuration: ${issues.join("; ")}`,
      });
    }
  }

  sanitize(text: string): string {
    return this.inspect(text).clean;
  }

  inspect(text: string): SanitizeResult {
    const original = text;
    let current = text;
    let allRedactions: readonly Redaction[] = [];

    for (const rule of this.rules) {
      try {
        const redactions = rule.find(current);
        if (redactions.length > 0) {
          allRedactions = [...allRedactions, ...redactions];
          current = rule.redact(current);
        }
      } catch (error) {
        logWarn("@lumen/sanitize", `Rule '${rule.name}' failed: ${describeThrown(error)}`);
        return {
          original,
          clean: REDACTED_TEXT,
          redactions: [{ rule: rule.name, index: 0, length: original.length }],
          redacted: true,
        };
      }
    }

    return {
      original,
      clean: current,
      redactions: allRedactions,
      redacted: allRedactions.length > 0,
    };
  }
}
