/**
 * transmute-base/text
 *
 * Whitespace cleanup and string coercion.
 */

import {
  defineConverter,
  isMapping,
  isMissing,
  ok,
  transform,
  type Converter,
  type Maybe,
  type Missing,
} from "transmute";

/**
 * `true` for falsy values and for empty arrays, sets, maps and mappings.
 */
export function isEmpty(value: unknown): boolean {
  if (!value) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Set || value instanceof Map) return value.size === 0;
  if (isMapping(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Replace an empty value (`""`, `0`, `false`, `[]`, `{}`...) by `null`.
 *
 * @example
 * ```typescript
 * emptyToNull.apply('');       // ok(null)
 * emptyToNull.apply([42, 43]); // ok([42, 43])
 * emptyToNull.apply('   ');    // ok('   ')
 * ```
 */
export const emptyToNull: Converter<unknown, unknown> = defineConverter((value: unknown) =>
  ok(isMissing(value) || !isEmpty(value) ? value : null)
);

/**
 * Trim a string; a blank string becomes `null`.
 *
 * @example
 * ```typescript
 * cleanupLine.apply('   Hello world!   '); // ok('Hello world!')
 * cleanupLine.apply('   ');                // ok(null)
 * ```
 */
export const cleanupLine: Converter<Maybe<string>, string | Missing> = transform(
  (value: string) => value.trim() || null
);

/**
 * Like `cleanupLine`, after turning CR LF and lone CR line breaks into LF.
 */
export const cleanupText: Converter<Maybe<string>, string | Missing> = transform(
  (value: string) => value.replace(/\r\n?/g, "\n").trim() || null
);

function escapeClass(chars: string): string {
  return chars.replace(/[\\\]^-]/g, "\\$&");
}

/**
 * Remove `chars` (whitespace by default) from both ends of a string. Unlike
 * `cleanupLine`, an empty result stays `""`.
 *
 * @example
 * ```typescript
 * strip().apply('  a  ');    // ok('a')
 * strip('/').apply('/a/b/'); // ok('a/b')
 * ```
 */
export function strip(chars?: string): Converter<Maybe<string>, string | Missing> {
  if (chars === undefined) {
    return transform((value: string) => value.trim());
  }
  const set = escapeClass(chars);
  const pattern = new RegExp(`^[${set}]+|[${set}]+$`, "g");
  return transform((value: string) => value.replace(pattern, ""));
}

/**
 * Split a string. Without a separator, splits on runs of whitespace and
 * ignores leading and trailing whitespace.
 *
 * @example
 * ```typescript
 * split().apply('  a  b c ');  // ok(['a', 'b', 'c'])
 * split(',').apply('a,,b');    // ok(['a', '', 'b'])
 * ```
 */
export function split(separator?: string | RegExp): Converter<Maybe<string>, string[] | Missing> {
  if (separator === undefined) {
    return transform((value: string) => {
      const trimmed = value.trim();
      return trimmed ? trimmed.split(/\s+/) : [];
    });
  }
  const by = separator;
  return transform((value: string) => value.split(by));
}

/**
 * Convert any present value to a string. Dates use their ISO form.
 *
 * @example
 * ```typescript
 * anythingToString.apply(42);   // ok('42')
 * anythingToString.apply(null); // ok(null)
 * ```
 */
export const anythingToString: Converter<unknown, string | Missing> = defineConverter((value: unknown) => {
  if (isMissing(value)) return ok(value);
  if (typeof value === "string") return ok(value);
  if (value instanceof Date) return ok(value.toISOString());
  return ok(String(value));
});
