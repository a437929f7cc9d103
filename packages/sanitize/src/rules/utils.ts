import type { Redaction, RedactionRule } from "../types.js";

/**
 * Collect all regex matches from content as redactions.
 * Uses a for-loop to avoid assignment-in-expression.
 */
export function collectRegexMatches(
  content: string,
  pattern: RegExp,
  ruleName: string,
): readonly Redaction[] {
  const redactions: Redaction[] = [];
  pattern.lastIndex = 0;
  for (let match = pattern.exec(content); match !== null; match = pattern.exec(content)) {
    redactions.push({ rule: ruleName, index: match.index, length: match[0].length });
  }
  return redactions;
}

/**
 * Build a rule that replaces every match of a global pattern.
 */
export function createPatternRule(
  name: string,
  description: string,
  pattern: RegExp,
  placeholder: string,
): RedactionRule {
  if (!pattern.global) {
    throw new TypeError(`Pattern for rule '${name}' must use the g flag`);
  }
  return {
    name,
    description,
    placeholder,
    find(content: string): readonly Redaction[] {
      return collectRegexMatches(content, pattern, name);
    },
    redact(content: string): string {
      return content.replace(pattern, placeholder);
    },
  };
}
