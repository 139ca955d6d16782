/**
 * @errtally/core
 *
 * Cumulative error records: a function returns either `ok(value)` or an
 * ErrorRecord that aggregates every error event raised along the way, each
 * with a rendered `(TAG) message` and an optional payload.
 */

// Module-level API (default context)
export { abortIfError, raise, registerTag, unwrapOrAbort } from "./api.js";

// Contexts and configuration
export {
  createErrorContext,
  defaultContext,
  type ErrorContext,
  type RaiseFunction,
} from "./context.js";
export {
  type ErrorContextConfig,
  type ResolvedErrorContextConfig,
  resolveErrorContextConfig,
} from "./config.js";

// Records and outcomes
export { ErrorRecord } from "./record.js";
export { isErrorValue, isOk, type Ok, ok, type Outcome } from "./outcome.js";

// Registry, rendering, aggregation
export { TagRegistry } from "./registry.js";
export { formatTemplate, joinParams, renderMessage, stringifyParam } from "./format.js";
export { aggregate, normalizeParams, type ResolvedTag, resolveTag } from "./aggregator.js";

// Serialization
export {
  deserializeRecord,
  safeDeserializeRecord,
  serializeRecord,
} from "./serialization.js";
export {
  type ErrorRecordJSON,
  ErrorRecordJSONSchema,
  type ErrorRecordJSONValidated,
} from "./wire/record-json.js";

// Types and constants
export type { AbortOptions, ParamValue, Params, TagRegistryOptions } from "./types.js";
export {
  BUILTIN_TEMPLATES,
  INVALID_TAG,
  MISSING_TAG,
  PACKAGE_NAME,
  PACKAGE_VERSION,
} from "./constants.js";
