/**
 * transmute-base/strings
 *
 * String simplification: Unicode normal forms, ASCII slugs and names that are
 * safe in URL paths and file names.
 */

import { transform, type Converter, type Maybe, type Missing } from "transmute";
import transliterations from "./ascii-transliterations.json";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Case transform applied last by `normalize()` and `slugify()`. `null`
 * keeps the case unchanged.
 */
export type CaseTransform = ((text: string) => string) | null;

export const lower = (text: string): string => text.toLowerCase();
export const upper = (text: string): string => text.toUpperCase();

export interface SimplifyOptions {
  /** Joins words. */
  separator?: string;
  /** @default lower */
  transform?: CaseTransform;
}

const ASCII = new Map<string, string>(Object.entries(transliterations));
const COMBINING_MARK = /\p{M}/u;
const SLUG_CHAR = /[ 0-9A-Z]/;

/**
 * Compatibility-decompose a string, drop combining marks and join its words
 * with `separator` (a space by default).
 *
 * @example
 * ```typescript
 * normalize('   Hello   world!   ');  // 'hello world!'
 * normalize('forêt, ça, où...');     // 'foret, ca, ou...'
 * ```
 */
export function normalize(text: string, options: SimplifyOptions = {}): string {
  const { separator = " ", transform: applyCase = lower } = options;
  const decomposed = [...text.normalize("NFKD")].filter((char) => !COMBINING_MARK.test(char)).join("");
  const trimmed = decomposed.trim();
  const joined = trimmed ? trimmed.split(/\s+/).join(separator) : "";
  return applyCase ? applyCase(joined) : joined;
}

function slugChars(char: string): string {
  const ascii = ASCII.get(char) ?? ((char.codePointAt(0) ?? 0) < 0x80 ? char : "");
  return [...ascii.toUpperCase()].map((c) => (SLUG_CHAR.test(c) ? c : " ")).join("");
}

/**
 * Reduce a string to ASCII letters and digits, words joined by `separator`
 * (`-` by default).
 *
 * @example
 * ```typescript
 * slugify('Hello world!');           // 'hello-world'
 * slugify('œil, forêt, ça, où...');  // 'oeil-foret-ca-ou'
 * ```
 */
export function slugify(text: string, options: SimplifyOptions = {}): string {
  const { separator = "-", transform: applyCase = lower } = options;
  const simplified = [...text].map(slugChars).join("").replace(/ {2,}/g, " ").trim();
  const joined = separator === " " ? simplified : simplified.split(" ").join(separator);
  return applyCase ? applyCase(joined) : joined;
}

// =============================================================================
// Converters
// =============================================================================

/**
 * Converter form of `normalize()`. A blank result becomes `null`.
 *
 * @example
 * ```typescript
 * makeInputToNormalForm().apply('   Hello world!   ');              // ok('hello world!')
 * makeInputToNormalForm({ separator: '_' }).apply('Hello world!');  // ok('hello_world!')
 * makeInputToNormalForm().apply('   ');                             // ok(null)
 * ```
 */
export function makeInputToNormalForm(options: SimplifyOptions = {}): Converter<Maybe<string>, string | Missing> {
  return transform((value: string) => normalize(value, options) || null);
}

/**
 * Converter form of `slugify()`. An empty slug becomes `null`.
 */
export function makeInputToSlug(options: SimplifyOptions = {}): Converter<Maybe<string>, string | Missing> {
  return transform((value: string) => slugify(value, options) || null);
}

/**
 * Slug with `-` separators, lower-cased.
 *
 * @example
 * ```typescript
 * inputToSlug.apply('   Hello world!   '); // ok('hello-world')
 * ```
 */
export const inputToSlug = makeInputToSlug();

const URL_UNSAFE = /[\n\r\\/;:"#*?&<>|.]/g;

/**
 * Normalize a string for use as a URL path segment, query parameter or file
 * name: unsafe characters and whitespace become `separator` (`_` by
 * default), repeated separators collapse and none remain at either end.
 *
 * @example
 * ```typescript
 * makeInputToUrlName().apply('   Hello world!   '); // ok('hello_world!')
 * makeInputToUrlName().apply('a/b.c');             // ok('a_b_c')
 * ```
 */
export function makeInputToUrlName(options: SimplifyOptions = {}): Converter<Maybe<string>, string | Missing> {
  const { separator = "_", transform: applyCase = lower } = options;
  return transform((value: string) => {
    let name = normalize(value.replace(URL_UNSAFE, separator), { separator, transform: applyCase });
    if (separator) {
      const doubled = separator + separator;
      while (name.includes(doubled)) name = name.split(doubled).join(separator);
      while (name.startsWith(separator)) name = name.slice(separator.length);
      while (name.endsWith(separator)) name = name.slice(0, -separator.length);
    }
    return name || null;
  });
}

export const inputToUrlName = makeInputToUrlName();
