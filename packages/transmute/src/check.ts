/**
 * transmute/check
 *
 * Boundary helpers that leave the (value, error) world: `check()` returns the
 * bare value or throws, `passes()` answers with a boolean.
 */

import type { ConversionContext } from "./context";
import { isConverter, type AnyConverter, type Converter } from "./converter";
import { ConversionCheckError } from "./errors";
import type { Conversion } from "./result";

export interface CheckOptions {
  /** Return `null` instead of throwing when the conversion failed. @default false */
  clearOnError?: boolean;
}

type Throwing = { clearOnError?: false };
type Clearing = { clearOnError: true };

function unwrap(result: Conversion<unknown>, clearOnError: boolean): unknown {
  if (result.ok) {
    return result.value;
  }
  if (clearOnError) {
    return null;
  }
  throw new ConversionCheckError(result.error, result.value);
}

/**
 * Extract the value of a conversion, throwing `ConversionCheckError` when it
 * failed. Given a converter, returns a function that applies it and checks
 * the result.
 *
 * @example
 * ```typescript
 * check(inputToInt.apply('42'));  // 42
 * check(inputToInt.apply('abc')); // throws ConversionCheckError: Value must be an integer for: 'abc'
 *
 * const toInt = check(inputToInt);
 * toInt('42'); // 42
 *
 * check(inputToInt, { clearOnError: true })('abc'); // null
 * ```
 */
export function check<T>(result: Conversion<T>, options?: Throwing): T;
export function check<T>(result: Conversion<T>, options: Clearing): T | null;
export function check<I, O>(
  converter: Converter<I, O>,
  options?: Throwing
): (value: I, context?: ConversionContext) => O;
export function check<I, O>(
  converter: Converter<I, O>,
  options: Clearing
): (value: I, context?: ConversionContext) => O | null;
export function check(subject: Conversion<unknown> | AnyConverter, options: CheckOptions = {}): unknown {
  const clearOnError = options.clearOnError ?? false;
  if (isConverter(subject)) {
    const converter = subject;
    return (value: unknown, context?: ConversionContext) =>
      unwrap(converter.apply(value, context), clearOnError);
  }
  return unwrap(subject, clearOnError);
}

/**
 * `true` when a conversion succeeded. Given a converter, returns a predicate
 * that applies it.
 *
 * @example
 * ```typescript
 * passes(inputToInt.apply('42')); // true
 *
 * const isInt = passes(inputToInt);
 * isInt('abc'); // false
 * ```
 */
export function passes(result: Conversion<unknown>): boolean;
export function passes<I>(converter: Converter<I, unknown>): (value: I, context?: ConversionContext) => boolean;
export function passes(
  subject: Conversion<unknown> | AnyConverter
): boolean | ((value: unknown, context?: ConversionContext) => boolean) {
  if (isConverter(subject)) {
    const converter = subject;
    return (value: unknown, context?: ConversionContext) => converter.apply(value, context).ok;
  }
  return subject.ok;
}
