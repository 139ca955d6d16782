/**
 * Shared types for @errtally/core.
 */

/**
 * A single message parameter.
 * `null` and `undefined` render as the empty string.
 */
export type ParamValue = string | number | bigint | boolean | null | undefined;

/**
 * Parameters accepted at the API boundary: one value, or an ordered list.
 * A list is always taken element-wise; wrap a list in another list to pass
 * it as a single parameter.
 */
export type Params = ParamValue | readonly ParamValue[];

/**
 * Options for {@link TagRegistry}.
 */
export interface TagRegistryOptions {
  /** Start with the built-in EARG/ELIB/ENOTAG/EOPEN/ESTAT/ETAG table (default true) */
  readonly includeBuiltins?: boolean;
  /** console.warn when a registration replaces a different template (default false) */
  readonly warnOnOverride?: boolean;
}

/**
 * Options for escalating an error record.
 */
export interface AbortOptions {
  /**
   * Escalate a record that holds no events (default false).
   * When true, an empty record throws with an empty message.
   */
  readonly abortOnEmpty?: boolean;
}
