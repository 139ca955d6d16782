import { EmptyRecordError, IndexOutOfRangeError } from "@errtally/errors";
import type { ErrorRecordJSON } from "./wire/record-json.js";

/**
 * Cumulative error record
 *
 * Holds any number of error events, each a rendered message plus an
 * optional payload. The record's tag is the tag of its first event and
 * never changes afterwards. Events are only ever appended.
 *
 * Records are built by `raise`; `ok: false` lets a record stand in as the
 * failure branch of an `Outcome<T>`.
 *
 * @typeParam P - type of the payloads attached to events
 */
export class ErrorRecord<P = unknown> {
  readonly ok = false as const;

  private firstTag: string | null = null;
  private readonly messages: string[] = [];
  private readonly payloads: (P | undefined)[] = [];

  /**
   * Rebuild a record from stored events, without re-rendering.
   * Callers are responsible for the record invariants.
   *
   * @internal
   */
  static restore<P>(
    tag: string | null,
    messages: readonly string[],
    payloads: readonly (P | undefined)[],
  ): ErrorRecord<P> {
    const record = new ErrorRecord<P>();
    record.firstTag = messages.length > 0 ? tag : null;
    record.messages.push(...messages);
    record.payloads.push(...payloads);
    return record;
  }

  /** Tag of the first event, or null while the record is empty */
  get tag(): string | null {
    return this.firstTag;
  }

  /** Number of aggregated events */
  get count(): number {
    return this.messages.length;
  }

  /**
   * Append one event. Sets the record tag on the first event only.
   *
   * @internal
   */
  appendEvent(tag: string, message: string, payload: P | undefined): this {
    if (this.messages.length === 0) {
      this.firstTag = tag;
    }
    this.messages.push(message);
    this.payloads.push(payload);
    return this;
  }

  // ==========================================================================
  // Messages
  // ==========================================================================

  /**
   * @throws {EmptyRecordError} if the record holds no events
   */
  lastMessage(): string {
    return this.messageAt(this.lastIndex("lastMessage"));
  }

  /**
   * @throws {IndexOutOfRangeError} unless `index` is an integer in `[0, count)`
   */
  messageAt(index: number): string {
    this.checkIndex(index);
    return this.messages[index] ?? "";
  }

  allMessages(): string[] {
    return [...this.messages];
  }

  /**
   * Messages at the given indices, in the order the indices are given.
   * Indices may repeat.
   *
   * @throws {IndexOutOfRangeError} on the first invalid index
   */
  messagesAt(indices: readonly number[]): string[] {
    return indices.map((index) => this.messageAt(index));
  }

  // ==========================================================================
  // Payloads
  // ==========================================================================

  /**
   * @throws {EmptyRecordError} if the record holds no events
   */
  lastPayload(): P | undefined {
    return this.payloadAt(this.lastIndex("lastPayload"));
  }

  /**
   * @throws {IndexOutOfRangeError} unless `index` is an integer in `[0, count)`
   */
  payloadAt(index: number): P | undefined {
    this.checkIndex(index);
    return this.payloads[index];
  }

  allPayloads(): (P | undefined)[] {
    return [...this.payloads];
  }

  /**
   * @throws {IndexOutOfRangeError} on the first invalid index
   */
  payloadsAt(indices: readonly number[]): (P | undefined)[] {
    return indices.map((index) => this.payloadAt(index));
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  /**
   * Summarize the record as one string: its last message.
   *
   * @throws {EmptyRecordError} if the record holds no events
   */
  render(): string {
    return this.messageAt(this.lastIndex("render"));
  }

  toString(): string {
    return this.count === 0 ? "(empty)" : this.render();
  }

  toJSON(): ErrorRecordJSON<P> {
    return {
      tag: this.firstTag,
      count: this.messages.length,
      messages: [...this.messages],
      payloads: [...this.payloads],
    };
  }

  private lastIndex(accessor: string): number {
    if (this.messages.length === 0) {
      throw new EmptyRecordError(accessor);
    }
    return this.messages.length - 1;
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.messages.length) {
      throw new IndexOutOfRangeError(index, this.messages.length);
    }
  }
}
