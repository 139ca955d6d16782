/**
 * Module-level API bound to the process-wide {@link defaultContext}.
 *
 * @example
 * ```typescript
 * registerTag('WARNING', 'Some files could not be opened');
 *
 * function openAll(paths: string[]): Outcome<string[]> {
 *   let error: ErrorRecord | undefined;
 *   for (const path of paths) {
 *     if (!existsSync(path)) error = raise(error, 'ESTAT', path);
 *   }
 *   return error ?? ok(paths);
 * }
 *
 * abortIfError(openAll(['a.nofile']));
 * ```
 */

import { defaultContext, type RaiseFunction } from "./context.js";
import type { Outcome } from "./outcome.js";
import type { AbortOptions } from "./types.js";

/**
 * Register a tag template in the default registry (insert or overwrite).
 *
 * @returns the tag
 */
export function registerTag(tag: string, template: string): string {
  return defaultContext.registerTag(tag, template);
}

/**
 * Create a record, or aggregate one event into an existing one, using the
 * default registry. Never throws on a bad or missing tag.
 */
export const raise: RaiseFunction = defaultContext.raise;

/**
 * Throw a FatalRecordError whose message joins every recorded message
 * with a space, if `value` is an error record. Otherwise a no-op.
 */
export function abortIfError(value: unknown, options?: AbortOptions): void {
  defaultContext.abortIfError(value, options);
}

export function unwrapOrAbort<T, P>(outcome: Outcome<T, P>): T {
  return defaultContext.unwrapOrAbort(outcome);
}
