import { defaultContext, type ErrorContext, type ErrorRecord } from "@errtally/core";

export const WARNING_TAG = "WARNING";
export const WFILE_TAG = "WFILE";

/**
 * Register the two tags the report renders with.
 */
export function registerReportTags(errors: ErrorContext = defaultContext): void {
  errors.registerTag(WARNING_TAG, "Some files could not be opened");
  errors.registerTag(WFILE_TAG, "\t%s");
}

/**
 * Report lines for a record of open failures: one WARNING line, then one
 * WFILE line per recorded message, in event order.
 */
export function reportOpenFailures(
  record: ErrorRecord<unknown>,
  errors: ErrorContext = defaultContext,
): string[] {
  registerReportTags(errors);

  return [
    errors.raise(undefined, WARNING_TAG).render(),
    ...record.allMessages().map((message) => errors.raise(undefined, WFILE_TAG, message).render()),
  ];
}
