/**
 * Event aggregation: resolve a tag, render its message, append the event.
 *
 * Aggregation never throws on a bad tag. An unregistered tag degrades to an
 * ETAG event and a missing one to an ENOTAG event, so a caller always gets a
 * usable record back.
 */

import { BUILTIN_TEMPLATES, INVALID_TAG, MISSING_TAG } from "./constants.js";
import { joinParams, renderMessage } from "./format.js";
import { ErrorRecord } from "./record.js";
import type { TagRegistry } from "./registry.js";
import type { ParamValue, Params } from "./types.js";

/**
 * A tag after fallback resolution, with the parameters to render it with.
 */
export interface ResolvedTag {
  readonly tag: string;
  readonly template: string;
  readonly params: readonly ParamValue[];
}

function isParamList(params: Params): params is readonly ParamValue[] {
  return Array.isArray(params);
}

/**
 * Normalize the API-boundary parameter form into an ordered list.
 */
export function normalizeParams(params: Params): ParamValue[] {
  if (isParamList(params)) {
    return [...params];
  }
  if (params === undefined || params === null) {
    return [];
  }
  return [params];
}

function fallbackTemplate(registry: TagRegistry, tag: string): string {
  return registry.lookup(tag) ?? BUILTIN_TEMPLATES[tag] ?? "%s";
}

/**
 * Resolve `tag` against the registry.
 *
 * - registered tag: used as is
 * - unregistered tag: ETAG with `(tag, joined params)`
 * - empty or missing tag: ENOTAG with `(joined params)`
 *
 * The ETAG and ENOTAG templates fall back to the built-in ones when the
 * registry does not carry them.
 */
export function resolveTag(
  registry: TagRegistry,
  tag: string | null | undefined,
  params: readonly ParamValue[],
): ResolvedTag {
  if (tag) {
    const template = registry.lookup(tag);
    if (template !== undefined) {
      return { tag, template, params };
    }
    return {
      tag: INVALID_TAG,
      template: fallbackTemplate(registry, INVALID_TAG),
      params: [tag, joinParams(params)],
    };
  }

  return {
    tag: MISSING_TAG,
    template: fallbackTemplate(registry, MISSING_TAG),
    params: [joinParams(params)],
  };
}

/**
 * Aggregate one event into `existing`, or into a fresh record when
 * `existing` is not an ErrorRecord.
 *
 * Without an existing record, and with `tag`, `params` and `payload` all
 * undefined, the fresh record is returned with no event. Given a record, a
 * call without a tag always appends an ENOTAG event.
 */
export function aggregate<P>(
  registry: TagRegistry,
  existing: ErrorRecord<P> | null | undefined,
  tag?: string | null,
  params?: Params,
  payload?: P,
): ErrorRecord<P> {
  const record = existing instanceof ErrorRecord ? existing : new ErrorRecord<P>();

  if (record !== existing && tag === undefined && params === undefined && payload === undefined) {
    return record;
  }

  const resolved = resolveTag(registry, tag, normalizeParams(params));
  const message = renderMessage(resolved.tag, resolved.template, resolved.params);

  return record.appendEvent(resolved.tag, message, payload);
}
