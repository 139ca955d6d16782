/**
 * @errtally/errors
 *
 * Failures thrown by the errtally packages themselves.
 *
 * Application errors are not thrown: they are aggregated into an
 * ErrorRecord by `@errtally/core`. The classes here cover the few points
 * where a record is misused, escalated, or rebuilt from bad input.
 * Each error carries a `.code` from the catalog.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, ErrtallyError, isErrtallyError } from "./base.js";

export {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getAllErrorCodes, getCatalogEntry, isValidErrorCode } from "./utils.js";

// ============================================================================
// ERROR CLASSES
// ============================================================================

export { ConfigurationError } from "./config.js";
export {
  EmptyRecordError,
  FatalRecordError,
  IndexOutOfRangeError,
  MalformedRecordError,
} from "./record.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isConfigurationError,
  isEmptyRecordError,
  isFatalRecordError,
  isIndexOutOfRangeError,
  isMalformedRecordError,
} from "./guards.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@errtally/errors";
export const PACKAGE_VERSION = "0.1.0";
