/**
 * transmute-base/booleans
 */

import {
  defineConverter,
  err,
  isMissing,
  localize,
  ok,
  pipe,
  transform,
  type Converter,
  type ConversionContext,
  type Maybe,
  type Missing,
} from "transmute";
import { BASE_MESSAGES } from "./messages";
import { cleanupLine, isEmpty } from "./text";

const INTEGER = /^[+-]?\d+$/;
const FALSE_WORDS = new Set(["f", "false", "n", "no", "off"]);
const TRUE_WORDS = new Set(["on", "t", "true", "y", "yes"]);

/**
 * `false` for empty values (see `isEmpty`), `true` otherwise. Any non-empty
 * string is `true`, `"0"` and `"false"` included.
 */
export const anythingToBool: Converter<unknown, boolean | Missing> = transform(
  (value: unknown) => !isEmpty(value)
);

/**
 * `"1"` for non-empty values, `"0"` for empty ones.
 *
 * @example
 * ```typescript
 * boolToString.apply(false); // ok('0')
 * boolToString.apply('0');   // ok('1')
 * pipe(defaultTo(false), boolToString).apply(null); // ok('0')
 * ```
 */
export const boolToString: Converter<unknown, "0" | "1" | Missing> = transform(
  (value: unknown): "0" | "1" => (isEmpty(value) ? "0" : "1")
);

/**
 * Convert an integer string to a boolean: zero is `false`, any other integer
 * `true`.
 *
 * @example
 * ```typescript
 * strToBool.apply('1');  // ok(true)
 * strToBool.apply('on'); // err('on', 'Value must be a boolean')
 * ```
 */
export const strToBool: Converter<Maybe<string>, boolean | Missing> = defineConverter(
  (value: Maybe<string>, context: ConversionContext) => {
    if (isMissing(value)) return ok(value);
    const text = value.trim();
    if (!INTEGER.test(text)) return err(value, localize(context, BASE_MESSAGES.NOT_A_BOOLEAN));
    return ok(Number(text) !== 0);
  }
);

export const inputToBool: Converter<Maybe<string>, boolean | Missing> = pipe(cleanupLine, strToBool);

/**
 * Like `strToBool`, also accepting booleans, numbers and the usual words
 * (`f`, `false`, `n`, `no`, `off` and `on`, `t`, `true`, `y`, `yes`, in any
 * case). A blank string becomes `null`.
 *
 * @example
 * ```typescript
 * guessBool.apply('  tRuE  '); // ok(true)
 * guessBool.apply('off');      // ok(false)
 * guessBool.apply('vrai');     // err('vrai', 'Value must be a boolean')
 * ```
 */
export const guessBool: Converter<unknown, boolean | Missing> = defineConverter(
  (value: unknown, context: ConversionContext) => {
    if (isMissing(value)) return ok(value);
    if (typeof value === "boolean") return ok(value);
    if (typeof value === "number" && Number.isFinite(value)) return ok(Math.trunc(value) !== 0);
    if (typeof value === "string") {
      const word = value.trim().toLowerCase();
      if (!word) return ok(null);
      if (INTEGER.test(word)) return ok(Number(word) !== 0);
      if (FALSE_WORDS.has(word)) return ok(false);
      if (TRUE_WORDS.has(word)) return ok(true);
    }
    return err(value, localize(context, BASE_MESSAGES.NOT_A_BOOLEAN));
  }
);
