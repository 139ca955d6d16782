/**
 * JSON wire format for error records
 *
 * A record travels as its tag, its event count and the two parallel event
 * sequences. Messages are carried already rendered.
 */

import { z } from "zod";

/**
 * Serialized error record
 */
export interface ErrorRecordJSON<P = unknown> {
  /**
   * Tag of the first event; null for an empty record
   */
  tag: string | null;

  /**
   * Number of events
   */
  count: number;

  /**
   * Rendered messages, in event order
   */
  messages: string[];

  /**
   * Payloads, parallel to `messages`
   */
  payloads: (P | undefined)[];
}

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

/**
 * Zod schema for ErrorRecordJSON, including the cross-field invariants:
 * both sequences hold `count` entries and a non-empty record has a tag.
 */
export const ErrorRecordJSONSchema = z
  .object({
    tag: z.string().min(1).nullable(),
    count: z.number().int().nonnegative(),
    messages: z.array(z.string()),
    payloads: z.array(z.unknown()),
  })
  .superRefine((value, ctx) => {
    if (value.messages.length !== value.count) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["messages"],
        message: `Expected ${value.count} messages, received ${value.messages.length}`,
      });
    }
    if (value.payloads.length !== value.count) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["payloads"],
        message: `Expected ${value.count} payloads, received ${value.payloads.length}`,
      });
    }
    if (value.count > 0 && value.tag === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tag"],
        message: "A record with events must have a tag",
      });
    }
    if (value.count === 0 && value.tag !== null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tag"],
        message: "An empty record cannot have a tag",
      });
    }
  });

/**
 * Type inferred from Zod schema (for validation)
 */
export type ErrorRecordJSONValidated = z.infer<typeof ErrorRecordJSONSchema>;
