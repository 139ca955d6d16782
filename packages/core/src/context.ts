import { FatalRecordError } from "@errtally/errors";
import { aggregate } from "./aggregator.js";
import {
  type ErrorContextConfig,
  type ResolvedErrorContextConfig,
  resolveErrorContextConfig,
} from "./config.js";
import { isErrorValue, type Outcome } from "./outcome.js";
import type { ErrorRecord } from "./record.js";
import { TagRegistry } from "./registry.js";
import type { AbortOptions, Params } from "./types.js";

/**
 * Create-or-aggregate signature shared by the context and module-level API.
 *
 * Called with no arguments it returns a fresh empty record.
 */
export interface RaiseFunction {
  (): ErrorRecord;
  <P = unknown>(
    existing: ErrorRecord<P> | null | undefined,
    tag?: string | null,
    params?: Params,
    payload?: P,
  ): ErrorRecord<P>;
}

/**
 * A tag registry plus the operations bound to it.
 *
 * Contexts are independent: registering a tag in one is invisible to the
 * others. The module-level functions use {@link defaultContext}.
 */
export interface ErrorContext {
  readonly registry: TagRegistry;
  readonly config: ResolvedErrorContextConfig;
  registerTag(tag: string, template: string): string;
  readonly raise: RaiseFunction;
  isErrorValue(value: unknown): value is ErrorRecord;
  /**
   * Throw a {@link FatalRecordError} if `value` is an error record.
   * Empty records are escalated only when `abortOnEmpty` is set.
   */
  abortIfError(value: unknown, options?: AbortOptions): void;
  /**
   * Return the value of an `Ok`, or escalate the record.
   * An empty record is escalated too: it carries no value to return.
   */
  unwrapOrAbort<T, P>(outcome: Outcome<T, P>): T;
}

function escalate(record: ErrorRecord<unknown>): never {
  throw new FatalRecordError(record.tag, record.allMessages());
}

/**
 * Create an error context from a validated configuration.
 *
 * @throws {ConfigurationError} if `config` is invalid
 *
 * @example
 * ```typescript
 * const errors = createErrorContext({ tags: { EDB: 'Query failed:[%s]' } });
 *
 * let error = errors.raise(undefined, 'EDB', 'select 1');
 * error = errors.raise(error, 'EOPEN', 'schema.sql');
 * error.count;  // 2
 * error.tag;    // 'EDB'
 * ```
 */
export function createErrorContext(config: ErrorContextConfig = {}): ErrorContext {
  const resolved = resolveErrorContextConfig(config);
  const registry = new TagRegistry({
    includeBuiltins: resolved.includeBuiltins,
    warnOnOverride: resolved.warnOnOverride,
  });

  for (const [tag, template] of Object.entries(resolved.tags)) {
    registry.register(tag, template);
  }

  const raise: RaiseFunction = <P = unknown>(
    existing?: ErrorRecord<P> | null,
    tag?: string | null,
    params?: Params,
    payload?: P,
  ): ErrorRecord<P> => aggregate(registry, existing, tag, params, payload);

  function abortIfError(value: unknown, options: AbortOptions = {}): void {
    if (!isErrorValue(value)) {
      return;
    }
    const abortOnEmpty = options.abortOnEmpty ?? resolved.abortOnEmpty;
    if (value.count === 0 && !abortOnEmpty) {
      return;
    }
    escalate(value);
  }

  function unwrapOrAbort<T, P>(outcome: Outcome<T, P>): T {
    if (outcome.ok) {
      return outcome.value;
    }
    return escalate(outcome);
  }

  return {
    registry,
    config: resolved,
    registerTag: (tag, template) => registry.register(tag, template),
    raise,
    isErrorValue: (value: unknown): value is ErrorRecord => isErrorValue(value),
    abortIfError,
    unwrapOrAbort,
  };
}

/**
 * Process-wide context behind the module-level API, created once with the
 * default configuration.
 */
export const defaultContext: ErrorContext = createErrorContext();
