/**
 * Configuration validation and resolution.
 */

import { ConfigurationError } from "@errtally/errors";
import { z } from "zod";

export interface ErrorContextConfig {
  /** Extra tag templates registered when the context is created */
  readonly tags?: Readonly<Record<string, string>>;
  /** Start from the built-in tag table (default true) */
  readonly includeBuiltins?: boolean;
  /** Let abortIfError escalate a record with no events (default false) */
  readonly abortOnEmpty?: boolean;
  /** console.warn when a registration replaces a different template (default false) */
  readonly warnOnOverride?: boolean;
}

export interface ResolvedErrorContextConfig {
  readonly tags: Readonly<Record<string, string>>;
  readonly includeBuiltins: boolean;
  readonly abortOnEmpty: boolean;
  readonly warnOnOverride: boolean;
}

const ErrorContextConfigSchema = z
  .object({
    tags: z.record(z.string().min(1, "Tag must not be empty"), z.string()).default({}),
    includeBuiltins: z.boolean().default(true),
    abortOnEmpty: z.boolean().default(false),
    warnOnOverride: z.boolean().default(false),
  })
  .strict();

/**
 * Validates and resolves an {@link ErrorContextConfig} into a fully-resolved
 * config with all defaults applied.
 *
 * @throws {ConfigurationError} on invalid input
 */
export function resolveErrorContextConfig(config: unknown = {}): ResolvedErrorContextConfig {
  const result = ErrorContextConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`,
    );
    throw new ConfigurationError(issues, { cause: result.error });
  }
  return result.data;
}
