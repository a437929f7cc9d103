/** A span replaced by a rule. Holds no matched text */
export interface Redaction {
  /** Rule name; index and length refer to the text that rule received */
  readonly rule: string;
  readonly index: number;
  readonly length: number;
}

/** Result of sanitizing text (immutable) */
export interface SanitizeResult {
  readonly original: string;
  readonly clean: string;
  readonly redactions: readonly Redaction[];
  readonly redacted: boolean;
}

/** A single redaction rule */
export interface RedactionRule {
  readonly name: string;
  readonly description: string;
  /** Bracketed token written in place of each match */
  readonly placeholder: string;
  /** Locate spans the rule would replace (does NOT modify content) */
  find(content: string): readonly Redaction[];
  /** Replace every match with the placeholder */
  redact(content: string): string;
}

/** Anything that can clean a log line */
export interface TextSanitizer {
  sanitize(text: string): string;
}

/** Configuration for LogSanitizer */
export interface LogSanitizerConfig {
  readonly rules?: readonly RedactionRule[];
}
