/**
 * Value-or-error return type.
 *
 * A function that may fail returns `Outcome<T>`: either `ok(value)` or the
 * ErrorRecord it accumulated. The `ok` field discriminates the two.
 */

import { ErrorRecord } from "./record.js";

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { readonly ok: true; readonly value: T };

/**
 * Represents a successful computation or an aggregated failure.
 */
export type Outcome<T, P = unknown> = Ok<T> | ErrorRecord<P>;

/**
 * Creates a successful Outcome.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Checks if an Outcome is successful.
 */
export const isOk = <T, P>(outcome: Outcome<T, P>): outcome is Ok<T> => outcome.ok;

/**
 * Checks if a value is an ErrorRecord.
 *
 * True for every record, empty or not; false for anything else,
 * including `null` and `undefined`.
 */
export function isErrorValue<T, P>(value: Outcome<T, P>): value is ErrorRecord<P>;
export function isErrorValue(value: unknown): value is ErrorRecord;
export function isErrorValue(value: unknown): value is ErrorRecord {
  return value instanceof ErrorRecord;
}
