/**
 * printf-style rendering of tag templates.
 *
 * Conversions are `%s`, `%d`, `%i` and `%f`, each with optional flags
 * (`-`, `+`, space, `0`, `#`), a width and a precision, plus `%%`. A
 * conversion past the last parameter renders as the empty string, surplus
 * parameters are ignored, and any other `%x` sequence is copied through
 * untouched.
 */

import type { ParamValue } from "./types.js";

const DIRECTIVE_REGEX = /%%|%([-+ 0#]*)(\d*)(?:\.(\d*))?([sdif])/g;

/** toFixed() accepts at most 100 digits */
const MAX_FRACTION_DIGITS = 100;

interface Directive {
  readonly flags: string;
  readonly width: number;
  readonly precision: number | undefined;
}

/**
 * String form of one parameter. Absent values render empty.
 */
export function stringifyParam(value: ParamValue): string {
  if (value === null || value === undefined) {
    return "";
  }
  return String(value);
}

/**
 * Space-joined string form of a parameter list.
 */
export function joinParams(params: readonly ParamValue[]): string {
  return params.map(stringifyParam).join(" ");
}

function signPrefix(negative: boolean, flags: string): string {
  if (negative) return "-";
  if (flags.includes("+")) return "+";
  if (flags.includes(" ")) return " ";
  return "";
}

function pad(prefix: string, body: string, directive: Directive, zeroFill: boolean): string {
  const fill = directive.width - prefix.length - body.length;
  if (fill <= 0) {
    return prefix + body;
  }
  if (directive.flags.includes("-")) {
    return prefix + body + " ".repeat(fill);
  }
  if (zeroFill && directive.flags.includes("0")) {
    return prefix + "0".repeat(fill) + body;
  }
  return " ".repeat(fill) + prefix + body;
}

function formatInteger(value: ParamValue, directive: Directive): string {
  let negative: boolean;
  let digits: string;

  if (typeof value === "bigint") {
    negative = value < 0n;
    digits = (negative ? -value : value).toString();
  } else {
    const n = Number(value ?? 0);
    const truncated = Number.isFinite(n) ? Math.trunc(n) : 0;
    negative = truncated < 0;
    digits = Math.abs(truncated).toString();
  }

  if (directive.precision !== undefined) {
    digits = digits.padStart(directive.precision, "0");
  }
  return pad(
    signPrefix(negative, directive.flags),
    digits,
    directive,
    directive.precision === undefined,
  );
}

function formatFloat(value: ParamValue, directive: Directive): string {
  const n = Number(value ?? 0);
  const finite = Number.isFinite(n) ? n : 0;
  const digits = Math.min(directive.precision ?? 6, MAX_FRACTION_DIGITS);

  const body = Math.abs(finite).toFixed(digits);
  return pad(signPrefix(finite < 0, directive.flags), body, directive, true);
}

function formatString(value: ParamValue, directive: Directive): string {
  const text = stringifyParam(value);
  const body = directive.precision === undefined ? text : text.slice(0, directive.precision);
  return pad("", body, directive, false);
}

/**
 * Substitute `params` positionally into `template`.
 */
export function formatTemplate(template: string, params: readonly ParamValue[]): string {
  let next = 0;

  return template.replace(
    DIRECTIVE_REGEX,
    (
      match: string,
      flags: string | undefined,
      width: string | undefined,
      precision: string | undefined,
      conversion: string | undefined,
    ) => {
      if (match === "%%") {
        return "%";
      }
      if (next >= params.length) {
        return "";
      }
      const value = params[next++];
      const directive: Directive = {
        flags: flags ?? "",
        width: width ? Number(width) : 0,
        precision: precision === undefined ? undefined : Number(precision),
      };
      switch (conversion) {
        case "d":
        case "i":
          return formatInteger(value, directive);
        case "f":
          return formatFloat(value, directive);
        default:
          return formatString(value, directive);
      }
    },
  );
}

/**
 * Render an event message: `(TAG) <formatted template>`.
 */
export function renderMessage(
  tag: string,
  template: string,
  params: readonly ParamValue[],
): string {
  return `(${tag}) ${formatTemplate(template, params)}`;
}
