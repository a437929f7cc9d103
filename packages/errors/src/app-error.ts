import type { ErrorCategory, ErrorSeverity } from "./catalog.js";
import { classify, type ErrorClassification } from "./classify.js";
import type { ErrorKind, ErrorKindType } from "./kinds.js";
import type { RecoveryAction } from "./recovery-actions.js";

function causeOf(kind: ErrorKind): unknown {
  return "cause" in kind ? kind.cause : undefined;
}

/**
 * A classified domain error.
 *
 * Wraps an {@link ErrorKind}; every other attribute is derived from the
 * catalog when the error is constructed. The optional underlying failure
 * carried by the kind is exposed as the standard `cause`.
 */
export class AppError extends Error {
  override readonly name = "AppError";
  readonly kind: ErrorKind;
  private readonly classification: ErrorClassification;

  constructor(kind: ErrorKind) {
    const classification = classify(kind);
    const cause = causeOf(kind);
    super(classification.message, cause === undefined ? undefined : { cause });
    this.kind = kind;
    this.classification = classification;
  }

  get type(): ErrorKindType {
    return this.kind.type;
  }

  get code(): string {
    return this.classification.code;
  }

  get severity(): ErrorSeverity {
    return this.classification.severity;
  }

  get category(): ErrorCategory {
    return this.classification.category;
  }

  get retryable(): boolean {
    return this.classification.retryable;
  }

  get recoveryActions(): readonly RecoveryAction[] {
    return this.classification.recoveryActions;
  }

  toJSON(): {
    name: string;
    type: ErrorKindType;
    code: string;
    message: string;
    severity: ErrorSeverity;
    category: ErrorCategory;
    retryable: boolean;
  } {
    return {
      name: this.name,
      type: this.type,
      code: this.code,
      message: this.message,
      severity: this.severity,
      category: this.category,
      retryable: this.retryable,
    };
  }
}
