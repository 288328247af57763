/**
 * transmute-base/tests
 *
 * Ready-made validators. Like `test()`, each returns the value unchanged,
 * skips missing values (except `testNotNone`) and attaches a message when the
 * check fails. Every factory takes an optional message overriding the
 * default one.
 */

import { isDeepStrictEqual } from "node:util";
import {
  defineConverter,
  describeValue,
  err,
  isMapping,
  isMissing,
  localize,
  ok,
  required,
  resolveMessage,
  test,
  type Converter,
  type ConversionContext,
  type Mapping,
  type Maybe,
  type Message,
  type MessageParams,
  type Missing,
} from "transmute";
import { BASE_MESSAGES } from "./messages";

function templated<T>(template: string, params: MessageParams): Message<T> {
  return (_value: T, context: ConversionContext) => localize(context, template, params);
}

// =============================================================================
// Comparisons
// =============================================================================

/**
 * Values that `testBetween()`, `testGreaterOrEqual()` and `testLessOrEqual()`
 * compare with `<=` and `>=`.
 */
export type Comparable = number | string;

/**
 * Accept values between `min` and `max`, both included.
 *
 * @example
 * ```typescript
 * testBetween(0, 9).apply(9);  // ok(9)
 * testBetween(0, 9).apply(10); // err(10, 'Value must be between 0 and 9')
 * ```
 */
export function testBetween(
  min: Comparable,
  max: Comparable,
  message?: Message<Comparable>
): Converter<Maybe<Comparable>, Maybe<Comparable>> {
  return test((value: Comparable) => min <= value && value <= max, {
    message: message ?? templated(BASE_MESSAGES.NOT_BETWEEN, { min, max }),
  });
}

/**
 * Accept values deeply equal to `constant`.
 *
 * @example
 * ```typescript
 * testEquals({ a: 1 }).apply({ a: 1 }); // ok({ a: 1 })
 * testEquals(41).apply(42);             // err(42, 'Value must be equal to 41')
 * ```
 */
export function testEquals<T>(constant: T, message?: Message<unknown>): Converter<unknown, unknown> {
  return test((value: unknown) => isDeepStrictEqual(value, constant), {
    message: message ?? templated(BASE_MESSAGES.NOT_EQUAL, { constant: describeValue(constant) }),
  });
}

export function testGreaterOrEqual(
  constant: Comparable,
  message?: Message<Comparable>
): Converter<Maybe<Comparable>, Maybe<Comparable>> {
  return test((value: Comparable) => value >= constant, {
    message: message ?? templated(BASE_MESSAGES.NOT_GREATER_OR_EQUAL, { constant }),
  });
}

export function testLessOrEqual(
  constant: Comparable,
  message?: Message<Comparable>
): Converter<Maybe<Comparable>, Maybe<Comparable>> {
  return test((value: Comparable) => value <= constant, {
    message: message ?? templated(BASE_MESSAGES.NOT_LESS_OR_EQUAL, { constant }),
  });
}

/**
 * Accept only `constant` itself (`Object.is`), not an equal copy.
 *
 * @example
 * ```typescript
 * testIs(42).apply(42);         // ok(42)
 * testIs(point).apply({ ...point }); // err({ x: 1 }, 'Value must be { x: 1 }')
 * ```
 */
export function testIs<T>(constant: T, message?: Message<unknown>): Converter<unknown, unknown> {
  return test((value: unknown) => Object.is(value, constant), {
    message: message ?? templated(BASE_MESSAGES.NOT_IDENTICAL, { constant: describeValue(constant) }),
  });
}

// =============================================================================
// Membership
// =============================================================================

/**
 * Candidates for `testIn()` and `testNotIn()`. A string matches its
 * substrings.
 */
export type Candidates<T> = readonly T[] | ReadonlySet<T> | string;

function isSet<T>(candidates: readonly T[] | ReadonlySet<T>): candidates is ReadonlySet<T> {
  return candidates instanceof Set;
}

function contains<T>(candidates: Candidates<T>, value: T): boolean {
  if (typeof candidates === "string") return typeof value === "string" && candidates.includes(value);
  return isSet(candidates) ? candidates.has(value) : candidates.includes(value);
}

function describeCandidates<T>(candidates: Candidates<T>): string {
  if (typeof candidates === "string") return describeValue(candidates);
  return describeValue(isSet(candidates) ? [...candidates] : candidates);
}

/**
 * Accept values found in `candidates`.
 *
 * @example
 * ```typescript
 * testIn(['a', 'b']).apply('a'); // ok('a')
 * testIn(['a', 'b']).apply('z'); // err('z', "Value must belong to ['a', 'b']")
 * ```
 */
export function testIn<T>(candidates: Candidates<T>, message?: Message<T>): Converter<Maybe<T>, Maybe<T>> {
  return test((value: T) => contains(candidates, value), {
    message: message ?? templated(BASE_MESSAGES.NOT_IN, { values: describeCandidates(candidates) }),
  });
}

/**
 * Reject values found in `candidates`.
 */
export function testNotIn<T>(candidates: Candidates<T>, message?: Message<T>): Converter<Maybe<T>, Maybe<T>> {
  return test((value: T) => !contains(candidates, value), {
    message: message ?? templated(BASE_MESSAGES.IN, { values: describeCandidates(candidates) }),
  });
}

// =============================================================================
// Types & Patterns
// =============================================================================

/**
 * Accept instances of `type`.
 *
 * @example
 * ```typescript
 * testInstanceOf(Date).apply(new Date()); // ok(<date>)
 * testInstanceOf(Date).apply('2024');     // err('2024', 'Value is not an instance of Date')
 * ```
 */
export function testInstanceOf<T>(
  type: abstract new (...args: never[]) => T,
  message?: Message<unknown>
): Converter<unknown, Maybe<T>> {
  return defineConverter((value: unknown, context: ConversionContext) => {
    if (isMissing(value) || value instanceof type) return ok(value);
    return err(
      value,
      resolveMessage(message ?? templated(BASE_MESSAGES.NOT_INSTANCE, { type: type.name }), value, context)
    );
  });
}

/**
 * Accept strings in which `pattern` finds a match. Anchor the pattern to
 * match whole strings.
 *
 * @example
 * ```typescript
 * testMatch(/^\d{5}$/).apply('75001'); // ok('75001')
 * testMatch(/^\d{5}$/).apply('7500');  // err('7500', 'Value must match /^\d{5}$/')
 * ```
 */
export function testMatch(pattern: RegExp, message?: Message<string>): Converter<Maybe<string>, Maybe<string>> {
  return test((value: string) => value.search(pattern) !== -1, {
    message: message ?? templated(BASE_MESSAGES.NO_MATCH, { pattern: String(pattern) }),
  });
}

function typeTest<T>(
  guard: (value: unknown) => value is T,
  template: string
): (message?: Message<unknown>) => Converter<unknown, Maybe<T>> {
  return (message) =>
    defineConverter((value: unknown, context: ConversionContext) => {
      if (isMissing(value) || guard(value)) return ok(value);
      return err(value, resolveMessage(message ?? template, value, context));
    });
}

export const testIsString = typeTest(
  (value): value is string => typeof value === "string",
  BASE_MESSAGES.NOT_A_STRING
);

export const testIsNumber = typeTest(
  (value): value is number => typeof value === "number" && !Number.isNaN(value),
  BASE_MESSAGES.NOT_A_NUMBER
);

export const testIsArray = typeTest((value): value is unknown[] => Array.isArray(value), BASE_MESSAGES.NOT_AN_ARRAY);

export const testIsRecord = typeTest((value): value is Mapping => isMapping(value), BASE_MESSAGES.NOT_A_RECORD);

// =============================================================================
// Presence
// =============================================================================

/**
 * Fail on any present value.
 *
 * @example
 * ```typescript
 * testNone().apply(null); // ok(null)
 * testNone().apply(42);   // err(42, 'Unexpected value')
 * ```
 */
export function testNone(message: Message<unknown> = BASE_MESSAGES.UNEXPECTED_VALUE): Converter<unknown, Missing> {
  return defineConverter((value: unknown, context: ConversionContext) =>
    isMissing(value) ? ok(value) : err(value, resolveMessage(message, value, context))
  );
}

/**
 * Fail on a missing value. Same as `required()`.
 */
export function testNotNone<T = unknown>(message?: Message<Missing>): Converter<Maybe<T>, T> {
  return required<T>(message);
}

/**
 * `testNotNone()` with the default `"Missing value"` message.
 */
export const notNone = testNotNone();
