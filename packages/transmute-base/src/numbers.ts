/**
 * transmute-base/numbers
 */

import {
  defineConverter,
  err,
  isMissing,
  localize,
  ok,
  pipe,
  type Converter,
  type ConversionContext,
  type Maybe,
  type Missing,
} from "transmute";
import { BASE_MESSAGES } from "./messages";
import { cleanupLine } from "./text";

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a number from a number, a boolean or a decimal string (surrounding
 * whitespace allowed). Anything else, including a string that overflows to
 * `Infinity`, yields `null`.
 */
export function parseNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") {
    const text = value.trim();
    if (!DECIMAL.test(text)) return null;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function numberConverter(
  parse: (value: unknown) => number | null,
  message: string
): Converter<unknown, number | Missing> {
  return defineConverter((value: unknown, context: ConversionContext) => {
    if (isMissing(value)) return ok(value);
    const parsed = parse(value);
    return parsed === null ? err(value, localize(context, message)) : ok(parsed);
  });
}

/**
 * Convert a number, boolean or numeric string to an integer, truncating any
 * fractional part.
 *
 * @example
 * ```typescript
 * anythingToInt.apply('42.75'); // ok(42)
 * anythingToInt.apply('42,75'); // err('42,75', 'Value must be an integer')
 * ```
 */
export const anythingToInt = numberConverter((value) => {
  const parsed = parseNumber(value);
  return parsed === null ? null : Math.trunc(parsed);
}, BASE_MESSAGES.NOT_AN_INTEGER);

/**
 * Convert a number, boolean or numeric string to a float.
 */
export const anythingToFloat = numberConverter(parseNumber, BASE_MESSAGES.NOT_A_FLOAT);

/**
 * `cleanupLine` then `anythingToInt`: blank strings become `null`.
 *
 * @example
 * ```typescript
 * inputToInt.apply('   42   '); // ok(42)
 * inputToInt.apply('   ');      // ok(null)
 * ```
 */
export const inputToInt: Converter<Maybe<string>, number | Missing> = pipe(cleanupLine, anythingToInt);

export const inputToFloat: Converter<Maybe<string>, number | Missing> = pipe(cleanupLine, anythingToFloat);
