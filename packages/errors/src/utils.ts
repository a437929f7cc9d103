import { AppError } from "./app-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry } from "./catalog.js";
import type { ErrorKindOf, ErrorKindType } from "./kinds.js";

/**
 * Look up the catalog entry for an error kind
 */
export function getCatalogEntry(type: ErrorKindType): ErrorCatalogEntry {
  return ERROR_CATALOG[type];
}

/**
 * Check if a string names a known error kind
 */
export function isErrorKindType(type: string): type is ErrorKindType {
  return Object.hasOwn(ERROR_CATALOG, type);
}

/**
 * Get every error kind tag in catalog order
 */
export function getAllErrorKindTypes(): ErrorKindType[] {
  return Object.keys(ERROR_CATALOG).filter(isErrorKindType);
}

/**
 * Wrap an unknown error into an AppError.
 * An AppError is returned as-is; anything else becomes `unexpectedError`
 * with the original value as its cause.
 */
export function wrapError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new AppError({ type: "unexpectedError", cause: error });
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if an error is an AppError with a specific code.
 */
export function hasCode(error: unknown, code: string): error is AppError {
  return error instanceof AppError && error.code === code;
}

/**
 * Check if an error is an AppError of a specific kind.
 * Narrows `kind` to the matching union member.
 */
export function isErrorKind<T extends ErrorKindType>(
  error: unknown,
  type: T,
): error is AppError & { readonly kind: ErrorKindOf<T> } {
  return error instanceof AppError && error.kind.type === type;
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes follow <DOMAIN>_<NNN>
 * - No code is used by two kinds
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const seen = new Map<string, string>();

  for (const [type, entry] of Object.entries(ERROR_CATALOG)) {
    if (!/^[A-Z]{3}_\d{3}$/.test(entry.code)) {
      errors.push(`Kind '${type}' has malformed code '${entry.code}'`);
    }

    const owner = seen.get(entry.code);
    if (owner !== undefined) {
      errors.push(`Code '${entry.code}' is shared by '${owner}' and '${type}'`);
    } else {
      seen.set(entry.code, type);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
