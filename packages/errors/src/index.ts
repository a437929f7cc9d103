/**
 * @lumen/errors
 *
 * Closed error taxonomy: kinds, the code catalog, recovery actions and the
 * pure classification that ties them together.
 */

export const PACKAGE_NAME = "@lumen/errors" as const;

export { AppError } from "./app-error.js";
export {
  CATEGORY_TITLES,
  ERROR_CATALOG,
  ERROR_CATEGORIES,
  ERROR_SEVERITIES,
  type ErrorCatalogEntry,
  type ErrorCategory,
  type ErrorSeverity,
  SEVERITY_TITLES,
  UNCATEGORIZED_ENTRY,
} from "./catalog.js";
export { classify, type ErrorClassification } from "./classify.js";
export type { ErrorKind, ErrorKindOf, ErrorKindType } from "./kinds.js";
export {
  actionDescription,
  actionTitle,
  isSameAction,
  type RecoveryAction,
  type RecoveryActionType,
  RecoveryActions,
} from "./recovery-actions.js";
export {
  getAllErrorKindTypes,
  getCatalogEntry,
  getErrorMessage,
  hasCode,
  isAppError,
  isErrorKind,
  isErrorKindType,
  validateCatalog,
  wrapError,
} from "./utils.js";
