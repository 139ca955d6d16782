/**
 * Constants for @errtally/core.
 */

export const PACKAGE_NAME = "@errtally/core";
export const PACKAGE_VERSION = "0.1.0";

/** Prefix for console output from the core */
export const LOG_PREFIX = "[errtally]";

/** Pseudo-tag used when a caller raises with a tag the registry does not know */
export const INVALID_TAG = "ETAG";

/** Pseudo-tag used when a caller raises without a tag */
export const MISSING_TAG = "ENOTAG";

/**
 * Tag templates every registry starts with.
 * Kept verbatim: callers match on the rendered text.
 */
export const BUILTIN_TEMPLATES: Readonly<Record<string, string>> = Object.freeze({
  EARG: "Missing argument:[%s]",
  ELIB: "Cannot use library:[%s] - %s",
  ENOTAG: "Missing tag. Params:[%s]",
  EOPEN: "Cannot open file:[%s]",
  ESTAT: "Cannot stat file:[%s]",
  ETAG: "Invalid tag:[%s] %s",
});
