/**
 * Type guards for errtally errors + code-level discrimination.
 */

import type { ErrtallyError } from "./base.js";
import type { ErrorCode } from "./catalog.js";
import { ConfigurationError } from "./config.js";
import {
  EmptyRecordError,
  FatalRecordError,
  IndexOutOfRangeError,
  MalformedRecordError,
} from "./record.js";

/** Check if an error is an EmptyRecordError (read on a record with no events) */
export function isEmptyRecordError(error: unknown): error is EmptyRecordError {
  return error instanceof EmptyRecordError;
}

/** Check if an error is an IndexOutOfRangeError (bad event index) */
export function isIndexOutOfRangeError(error: unknown): error is IndexOutOfRangeError {
  return error instanceof IndexOutOfRangeError;
}

/** Check if an error is a FatalRecordError (escalated record) */
export function isFatalRecordError(error: unknown): error is FatalRecordError {
  return error instanceof FatalRecordError;
}

/** Check if an error is a MalformedRecordError (bad serialized record) */
export function isMalformedRecordError(error: unknown): error is MalformedRecordError {
  return error instanceof MalformedRecordError;
}

/** Check if an error is a ConfigurationError (bad context config) */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Check if an ErrtallyError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: ErrtallyError,
  code: C,
): error is ErrtallyError & { readonly code: C } {
  return error.code === code;
}
