/**
 * transmute/leaves
 *
 * Leaf adapters: wrap plain functions and constants into the converter
 * contract. Unless `handleMissingValue` is set, a leaf given a missing value
 * returns it untouched with no error and never runs the wrapped function.
 */

import type { ConversionContext } from "./context";
import { defineConverter, type Converter } from "./converter";
import { MESSAGES } from "./messages";
import {
  err,
  isMissing,
  ok,
  type ConversionError,
  type Maybe,
  type Missing,
} from "./result";

// =============================================================================
// Types
// =============================================================================

/**
 * An error message: a literal (translated through the context) or a
 * formatter that receives the offending value.
 */
export type Message<T = unknown> = string | ((value: T, context: ConversionContext) => string);

type ValueFn<I, O> = (value: I) => O;
type StateFn<I, O> = (value: I, context: ConversionContext) => O;

// Method syntax keeps the parameters bivariant, so both callback shapes are
// assignable to the implementation signatures below; the `StateFn` member lets
// the `handleState: true` overloads match under strictNullChecks.
type LeafFn<I, O> = { call(value: I, context?: ConversionContext): O }["call"] & StateFn<I, O>;

/**
 * Options shared by `transform()` and `test()`.
 */
export interface LeafOptions {
  /** Run the wrapped function on missing values too. @default false */
  handleMissingValue?: boolean;
  /** Pass the context as second argument. @default false */
  handleState?: boolean;
}

type SkipMissing = { handleMissingValue?: false };
type HandleMissing = { handleMissingValue: true };
type WithoutState = { handleState?: false };
type WithState = { handleState: true };

/**
 * Resolve a message for a value: literals go through `context.translate`.
 */
export function resolveMessage<T>(message: Message<T>, value: T, context: ConversionContext): string {
  return typeof message === "function" ? message(value, context) : context.translate(message);
}

// =============================================================================
// transform()
// =============================================================================

/**
 * Wrap a total transform. It never produces a protocol error; if the function
 * throws, the exception propagates to the caller.
 *
 * @example
 * ```typescript
 * transform((s: string) => s.trim()).apply('  a  '); // ok('a')
 * transform((s: string) => s.trim()).apply(null);    // ok(null), function not called
 *
 * const greet = transform(
 *   (name: string, context) => context.translate('Hello {name}').replace('{name}', name),
 *   { handleState: true }
 * );
 * ```
 */
export function transform<I, O>(
  fn: ValueFn<I, O>,
  options?: SkipMissing & WithoutState
): Converter<Maybe<I>, O | Missing>;
export function transform<I, O>(
  fn: StateFn<I, O>,
  options: SkipMissing & WithState
): Converter<Maybe<I>, O | Missing>;
export function transform<I, O>(
  fn: ValueFn<I, O>,
  options: HandleMissing & WithoutState
): Converter<I, O>;
export function transform<I, O>(fn: StateFn<I, O>, options: HandleMissing & WithState): Converter<I, O>;
export function transform<I, O>(
  fn: LeafFn<Maybe<I>, O>,
  options: LeafOptions = {}
): Converter<Maybe<I>, Maybe<I> | O> {
  const { handleMissingValue = false, handleState = false } = options;
  return defineConverter<Maybe<I>, Maybe<I> | O>((value: Maybe<I>, context) => {
    if (isMissing(value) && !handleMissingValue) {
      return ok(value);
    }
    return ok(handleState ? fn(value, context) : fn(value));
  });
}

// =============================================================================
// test()
// =============================================================================

/**
 * Options for `test()`.
 */
export interface TestOptions<T> extends LeafOptions {
  /** Error when the predicate fails. @default "Test failed" */
  message?: Message<T>;
}

/**
 * Wrap a predicate. The value is always returned unchanged; a falsy
 * predicate result attaches the error message.
 *
 * @example
 * ```typescript
 * const isEven = test((n: number) => n % 2 === 0, { message: 'Value must be even' });
 * isEven.apply(4); // ok(4)
 * isEven.apply(3); // err(3, 'Value must be even')
 * ```
 */
export function test<T>(
  predicate: ValueFn<T, boolean>,
  options?: Omit<TestOptions<T>, "handleMissingValue" | "handleState"> & SkipMissing & WithoutState
): Converter<Maybe<T>, Maybe<T>>;
export function test<T>(
  predicate: StateFn<T, boolean>,
  options: Omit<TestOptions<T>, "handleMissingValue" | "handleState"> & SkipMissing & WithState
): Converter<Maybe<T>, Maybe<T>>;
export function test<T>(
  predicate: ValueFn<T, boolean>,
  options: Omit<TestOptions<T>, "handleMissingValue" | "handleState"> & HandleMissing & WithoutState
): Converter<T, T>;
export function test<T>(
  predicate: StateFn<T, boolean>,
  options: Omit<TestOptions<T>, "handleMissingValue" | "handleState"> & HandleMissing & WithState
): Converter<T, T>;
export function test<T>(
  predicate: LeafFn<Maybe<T>, boolean>,
  options: TestOptions<Maybe<T>> = {}
): Converter<Maybe<T>, Maybe<T>> {
  const { message = MESSAGES.TEST_FAILED, handleMissingValue = false, handleState = false } = options;
  return defineConverter<Maybe<T>, Maybe<T>>((value: Maybe<T>, context) => {
    if (isMissing(value) && !handleMissingValue) {
      return ok(value);
    }
    const passed = handleState ? predicate(value, context) : predicate(value);
    return passed ? ok(value) : err(value, resolveMessage(message, value, context));
  });
}

// =============================================================================
// Constant Leaves
// =============================================================================

function isProducer<T>(fallback: T | (() => T)): fallback is () => T {
  return typeof fallback === "function";
}

/**
 * Replace a missing value by `fallback`. A function is treated as a
 * zero-argument producer and called on each use.
 *
 * @example
 * ```typescript
 * pipe(inputToInt, defaultTo(42)).apply('   '); // ok(42)
 * defaultTo(() => new Date()).apply(undefined);  // ok(<now>)
 * ```
 */
export function defaultTo<T, V = T>(fallback: T | (() => T)): Converter<Maybe<V>, V | T> {
  return defineConverter<Maybe<V>, V | T>((value: Maybe<V>) => {
    if (!isMissing(value)) {
      return ok(value);
    }
    return ok(isProducer(fallback) ? fallback() : fallback);
  });
}

/**
 * Always fail with `message`, keeping the value. Runs on missing values too.
 *
 * @example
 * ```typescript
 * fail('Wrong answer').apply(42); // err(42, 'Wrong answer')
 * fail().apply(null);             // err(null, 'An error occurred')
 * ```
 */
export function fail<I = unknown>(message: Message<I> = MESSAGES.ERROR_OCCURRED): Converter<I, never> {
  return defineConverter<I, never>((value: I, context) => err(value, resolveMessage(message, value, context)));
}

/**
 * Identity converter. Missing values included.
 */
export function noop<T = unknown>(): Converter<T, T> {
  return defineConverter((value: T) => ok(value));
}

/**
 * Replace any present value by `constant`.
 *
 * @example
 * ```typescript
 * setValue(42).apply('anything');                         // ok(42)
 * setValue(42).apply(null);                               // ok(null)
 * setValue(42, { handleMissingValue: true }).apply(null); // ok(42)
 * ```
 */
export function setValue<T>(constant: T, options?: SkipMissing): Converter<unknown, T | Missing>;
export function setValue<T>(constant: T, options: HandleMissing): Converter<unknown, T>;
export function setValue<T>(
  constant: T,
  options: { handleMissingValue?: boolean } = {}
): Converter<unknown, Maybe<T>> {
  const handleMissingValue = options.handleMissingValue ?? false;
  return defineConverter((value: unknown) =>
    isMissing(value) && !handleMissingValue ? ok(value) : ok(constant)
  );
}

// =============================================================================
// translate()
// =============================================================================

/**
 * Lookup table for `translate()`. A `Map` may have any key, `null` included;
 * a record matches string and number values.
 */
export type TranslationTable<I, V> = ReadonlyMap<I, V> | Readonly<Record<string, V>>;

function isMapTable<I, V>(table: TranslationTable<I, V>): table is ReadonlyMap<I, V> {
  return table instanceof Map;
}

/**
 * Replace values found in `table`, pass others through unchanged. Missing
 * values are looked up too, so a `Map` can translate `null`.
 *
 * @example
 * ```typescript
 * translate({ 0: 'bad', 1: 'OK' }).apply(1); // ok('OK')
 * translate({ 0: 'bad', 1: 'OK' }).apply(2); // ok(2)
 * translate(new Map([[null, 'none']])).apply(null); // ok('none')
 * ```
 */
export function translate<I, V>(table: TranslationTable<I, V>): Converter<I, I | V> {
  // Replacements are boxed so an `undefined` replacement is still a hit.
  const lookup = new Map<unknown, { replacement: V }>();
  const byString = !isMapTable(table);
  if (isMapTable(table)) {
    for (const [key, replacement] of table) lookup.set(key, { replacement });
  } else {
    for (const [key, replacement] of Object.entries(table)) lookup.set(key, { replacement });
  }

  return defineConverter<I, I | V>((value: I) => {
    if (byString && typeof value !== "string" && typeof value !== "number") {
      return ok(value);
    }
    const hit = lookup.get(byString ? String(value) : value);
    return hit ? ok(hit.replacement) : ok(value);
  });
}

// =============================================================================
// Error Handling Leaves
// =============================================================================

/**
 * Recovery function for `catchError()`.
 */
export type Recover<R> = (value: unknown, error: ConversionError, context: ConversionContext) => R;

/**
 * Run `inner` and discard its error. On failure the value becomes
 * `recover(value, error, context)`, or `null` without a recover function.
 *
 * @example
 * ```typescript
 * catchError(inputToInt).apply('abc');              // ok(null)
 * catchError(inputToInt, () => 0).apply('abc');     // ok(0)
 * catchError(inputToInt, (value) => value).apply('abc'); // ok('abc')
 * ```
 */
export function catchError<I, O>(inner: Converter<I, O>): Converter<I, O | null>;
export function catchError<I, O, R>(inner: Converter<I, O>, recover: Recover<R>): Converter<I, O | R>;
export function catchError<I, O, R>(
  inner: Converter<I, O>,
  recover?: Recover<R>
): Converter<I, O | R | null> {
  return defineConverter<I, O | R | null>((value: I, context) => {
    const result = inner.apply(value, context);
    if (result.ok) {
      return result;
    }
    return ok(recover ? recover(result.value, result.error, context) : null);
  });
}

/**
 * Validate with a converter while keeping the original value: the inner
 * converter's output is discarded, its error kept.
 *
 * @example
 * ```typescript
 * testConverter(inputToInt).apply('42');  // ok('42')
 * testConverter(inputToInt).apply('abc'); // err('abc', 'Value must be an integer')
 * ```
 */
export function testConverter<I>(inner: Converter<I, unknown>): Converter<I, I> {
  return defineConverter((value: I, context) => {
    const result = inner.apply(value, context);
    return result.ok ? ok(value) : err(value, result.error);
  });
}

/**
 * Fail on a missing value, pass anything else through.
 *
 * @example
 * ```typescript
 * required().apply('');   // ok('')
 * required().apply(null); // err(null, 'Missing value')
 * ```
 */
export function required<T>(message: Message<Missing> = MESSAGES.MISSING_VALUE): Converter<Maybe<T>, T> {
  return defineConverter((value: Maybe<T>, context) =>
    isMissing(value) ? err(value, resolveMessage(message, value, context)) : ok(value)
  );
}
