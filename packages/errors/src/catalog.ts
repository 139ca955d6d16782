/**
 * Error Catalog - Single Source of Truth
 *
 * Every failure the errtally packages themselves throw maps to one code here.
 * Application error events are not listed: those are tags in a TagRegistry
 * and travel inside an ErrorRecord instead of being thrown.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: RECORD, SERIALIZATION, CONFIG
 */

export type ErrorDomain = "record" | "serialization" | "config";

/**
 * Shape every catalog entry satisfies.
 */
export interface ErrorCatalogEntry {
  readonly domain: ErrorDomain;
  /** Expected conditions are caller mistakes; unexpected ones are escalations */
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

export const ERROR_CATALOG = {
  // ============================================================================
  // RECORD ERRORS - Accessing or escalating an error record
  // ============================================================================
  RECORD_EMPTY: {
    domain: "record",
    isExpected: true,
    title: "Empty error record",
    description: "The error record holds no events to read from",
  },
  RECORD_INDEX_OUT_OF_RANGE: {
    domain: "record",
    isExpected: true,
    title: "Event index out of range",
    description: "The requested event index does not exist in the error record",
  },
  RECORD_FATAL: {
    domain: "record",
    isExpected: false,
    title: "Fatal error record",
    description: "An error record was escalated to a fatal failure",
  },

  // ============================================================================
  // SERIALIZATION ERRORS - Rebuilding records from the wire
  // ============================================================================
  RECORD_MALFORMED: {
    domain: "serialization",
    isExpected: true,
    title: "Malformed error record",
    description: "A serialized error record failed validation",
  },

  // ============================================================================
  // CONFIG ERRORS - Context construction
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    isExpected: true,
    title: "Invalid configuration",
    description: "The error context configuration is invalid",
  },
} as const satisfies Record<string, ErrorCatalogEntry>;

export type ErrorCode = keyof typeof ERROR_CATALOG;
