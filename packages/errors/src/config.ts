import { ErrtallyError } from "./base.js";

/**
 * Thrown when an error context is created from an invalid configuration.
 */
export class ConfigurationError extends ErrtallyError {
  readonly _tag = "ConfigurationError" as const;
  readonly code = "CONFIG_INVALID" as const;
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: ErrorOptions) {
    super(`Invalid error context configuration: ${issues.join("; ")}`, undefined, options);
    this.issues = [...issues];
  }
}
