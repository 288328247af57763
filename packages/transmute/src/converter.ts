/**
 * transmute/converter
 *
 * The single-operation contract every converter implements, leaf or
 * combinator alike.
 */

import { defaultContext, type ConversionContext } from "./context";
import type { Conversion } from "./result";

// =============================================================================
// Contract
// =============================================================================

/**
 * A converter turns an input into a `Conversion`: the converted value and
 * `null`, or a best-effort value and a protocol error.
 *
 * Converters are immutable and never mutate their input or the context, so a
 * single instance can be shared across any number of calls.
 *
 * @typeParam I - Accepted input
 * @typeParam O - Output on success
 */
export interface Converter<I = unknown, O = I> {
  apply(value: I, context?: ConversionContext): Conversion<O>;
}

/**
 * Implementation function behind a converter. The context is always resolved.
 */
export type ConvertFn<I, O> = (value: I, context: ConversionContext) => Conversion<O>;

/**
 * Converter of any input and output. Used where combinators accept
 * heterogeneous converters (struct schemas, branch tables).
 */
export type AnyConverter = Converter<unknown, unknown>;

/**
 * Extract the input type of a converter.
 */
export type InputOf<C> = C extends Converter<infer I, unknown> ? I : never;

/**
 * Extract the output type of a converter.
 */
export type OutputOf<C> = C extends Converter<never, infer O> ? O : never;

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a frozen converter from its implementation. `apply` falls back to
 * `defaultContext` when called without a context.
 *
 * @example
 * ```typescript
 * const toUpper = defineConverter((value: Maybe<string>) =>
 *   ok(isMissing(value) ? value : value.toUpperCase())
 * );
 *
 * toUpper.apply('abc'); // { ok: true, value: 'ABC', error: null }
 * ```
 */
export function defineConverter<I, O>(run: ConvertFn<I, O>): Converter<I, O> {
  return Object.freeze({
    apply(value: I, context: ConversionContext = defaultContext): Conversion<O> {
      return run(value, context);
    },
  });
}

/**
 * Checks if a value implements the converter contract.
 */
export const isConverter = (value: unknown): value is AnyConverter =>
  typeof value === "object" &&
  value !== null &&
  "apply" in value &&
  typeof value.apply === "function";
