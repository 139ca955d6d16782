/**
 * Error record serialization and deserialization
 *
 * Converts between ErrorRecord instances and the JSON wire format in
 * `wire/record-json.ts`. Deserialization validates with Zod and rebuilds the
 * record from the stored messages without rendering them again.
 */

import { MalformedRecordError } from "@errtally/errors";
import { ErrorRecord } from "./record.js";
import { type ErrorRecordJSON, ErrorRecordJSONSchema } from "./wire/record-json.js";

/**
 * Serialize an ErrorRecord to its JSON wire form.
 */
export function serializeRecord<P>(record: ErrorRecord<P>): ErrorRecordJSON<P> {
  return record.toJSON();
}

/**
 * Deserialize a JSON wire form back into an ErrorRecord.
 *
 * Payloads are not validated: they come back as `unknown`.
 *
 * @throws {MalformedRecordError} if the input fails validation
 */
export function deserializeRecord(raw: unknown): ErrorRecord {
  const result = ErrorRecordJSONSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`,
    );
    throw new MalformedRecordError(issues, { cause: result.error });
  }

  const { tag, messages, payloads } = result.data;
  return ErrorRecord.restore<unknown>(tag, messages, payloads);
}

/**
 * Deserialize without throwing: returns undefined on malformed input.
 */
export function safeDeserializeRecord(raw: unknown): ErrorRecord | undefined {
  const result = ErrorRecordJSONSchema.safeParse(raw);
  if (!result.success) {
    return undefined;
  }
  const { tag, messages, payloads } = result.data;
  return ErrorRecord.restore<unknown>(tag, messages, payloads);
}
