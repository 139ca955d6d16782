import { ErrtallyError } from "./base.js";

// ---------------------------------------------------------------------------
// Empty record
// ---------------------------------------------------------------------------

/**
 * Thrown when the last event of a record is read but the record has none.
 */
export class EmptyRecordError extends ErrtallyError {
  readonly _tag = "EmptyRecordError" as const;
  readonly code = "RECORD_EMPTY" as const;
  readonly accessor: string;

  constructor(accessor: string) {
    super(`Cannot read ${accessor}: the error record holds no events`);
    this.accessor = accessor;
  }
}

// ---------------------------------------------------------------------------
// Index out of range
// ---------------------------------------------------------------------------

/**
 * Thrown when an event index is not an integer in `[0, count)`.
 */
export class IndexOutOfRangeError extends ErrtallyError {
  readonly _tag = "IndexOutOfRangeError" as const;
  readonly code = "RECORD_INDEX_OUT_OF_RANGE" as const;
  readonly index: number;
  readonly count: number;

  constructor(index: number, count: number) {
    super(
      count === 0
        ? `Event index ${index} is out of range: the error record is empty`
        : `Event index ${index} is out of range [0, ${count - 1}]`,
      { index: String(index), count: String(count) },
    );
    this.index = index;
    this.count = count;
  }
}

// ---------------------------------------------------------------------------
// Fatal escalation
// ---------------------------------------------------------------------------

/**
 * Thrown when an error record is escalated to a fatal failure.
 *
 * The message is every recorded message joined by a single space, in event
 * order. The tag and the messages are kept for callers that catch it.
 */
export class FatalRecordError extends ErrtallyError {
  readonly _tag = "FatalRecordError" as const;
  readonly code = "RECORD_FATAL" as const;
  readonly tag: string | null;
  readonly messages: readonly string[];

  constructor(tag: string | null, messages: readonly string[], options?: ErrorOptions) {
    super(messages.join(" "), tag === null ? undefined : { tag }, options);
    this.tag = tag;
    this.messages = [...messages];
  }
}

// ---------------------------------------------------------------------------
// Malformed serialized record
// ---------------------------------------------------------------------------

/**
 * Thrown when a serialized error record fails validation.
 */
export class MalformedRecordError extends ErrtallyError {
  readonly _tag = "MalformedRecordError" as const;
  readonly code = "RECORD_MALFORMED" as const;
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: ErrorOptions) {
    super(`Malformed error record: ${issues.join("; ")}`, undefined, options);
    this.issues = [...issues];
  }
}
