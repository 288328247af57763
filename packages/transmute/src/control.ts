/**
 * transmute/control
 *
 * Control-flow combinators: pick which converter runs on a value. Every
 * branch receives the original input, never the output of the test or
 * selector that chose it.
 */

import { localize } from "./context";
import { defineConverter, type AnyConverter, type Converter, type InputOf, type OutputOf } from "./converter";
import { noop } from "./leaves";
import { MESSAGES } from "./messages";
import { err, isMissing, ok, type Conversion, type Missing } from "./result";

// =============================================================================
// condition()
// =============================================================================

/**
 * Run `test`; a test error is returned as-is. Otherwise the truthiness of the
 * test's value selects `ifTrue` or `ifFalse` (identity by default).
 *
 * @example
 * ```typescript
 * const isText = transform((value: unknown) => typeof value === 'string', { handleMissingValue: true });
 * const toNumber = condition(isText, inputToFloat, anythingToFloat);
 *
 * toNumber.apply(' 1.5 '); // ok(1.5), via inputToFloat
 * toNumber.apply(true);    // ok(1), via anythingToFloat
 * ```
 */
export function condition<I, O>(test: Converter<I, unknown>, ifTrue: Converter<I, O>): Converter<I, I | O>;
export function condition<I, O1, O2>(
  test: Converter<I, unknown>,
  ifTrue: Converter<I, O1>,
  ifFalse: Converter<I, O2>
): Converter<I, O1 | O2>;
export function condition(
  test: AnyConverter,
  ifTrue: AnyConverter,
  ifFalse: AnyConverter = noop()
): AnyConverter {
  return defineConverter((value: unknown, context) => {
    const outcome = test.apply(value, context);
    if (!outcome.ok) {
      return outcome;
    }
    return (outcome.value ? ifTrue : ifFalse).apply(value, context);
  });
}

// =============================================================================
// firstMatch()
// =============================================================================

/**
 * Try converters in order on the same input. The first success wins; when all
 * fail, the last failure is returned. With no converters it is the identity.
 *
 * @example
 * ```typescript
 * const idOrSlug = firstMatch(inputToInt, inputToSlug);
 * idOrSlug.apply('42');          // ok(42)
 * idOrSlug.apply('Hello World'); // ok('hello-world')
 *
 * firstMatch(fail('m1'), fail('m2')).apply(1); // err(1, 'm2')
 * ```
 */
export function firstMatch<T = unknown>(): Converter<T, T>;
export function firstMatch<C extends AnyConverter[]>(
  ...converters: C
): Converter<InputOf<C[number]>, OutputOf<C[number]>>;
export function firstMatch(...converters: AnyConverter[]): AnyConverter {
  return defineConverter((value: unknown, context) => {
    let result: Conversion<unknown> = ok(value);
    for (const converter of converters) {
      result = converter.apply(value, context);
      if (result.ok) {
        return result;
      }
    }
    return result;
  });
}

// =============================================================================
// switchOn()
// =============================================================================

/**
 * Branches of `switchOn()`: a `Map` keyed by any selector value, or a record
 * matched against string and number selector values.
 */
export type BranchTable<K, B> = ReadonlyMap<K, B> | Readonly<Record<string, B>>;

export interface SwitchOptions<D extends AnyConverter> {
  /** Branch used when the selector value matches no key. */
  default?: D;
  /** Run the selector on missing values too. @default false */
  handleMissingValue?: boolean;
}

function isBranchMap<K, B>(table: BranchTable<K, B>): table is ReadonlyMap<K, B> {
  return table instanceof Map;
}

/**
 * Compute a key with `selector` and apply the matching branch to the
 * original value. A selector error is reported against the original value;
 * an unmatched key without a default branch fails with
 * `Expression "<key>" doesn't match any key`.
 *
 * @example
 * ```typescript
 * const byType = switchOn(
 *   transform((value: unknown) => typeof value),
 *   {
 *     boolean: setValue('boolean'),
 *     number: anythingToString,
 *   },
 *   { default: fail('Unsupported type') }
 * );
 *
 * byType.apply(true); // ok('boolean')
 * byType.apply(42);   // ok('42')
 * byType.apply({});   // err({}, 'Unsupported type')
 * ```
 */
export function switchOn<I, K, B extends AnyConverter, D extends AnyConverter = never>(
  selector: Converter<I, K>,
  branches: BranchTable<K, B>,
  options?: SwitchOptions<D>
): Converter<I, OutputOf<B> | OutputOf<D> | Extract<I, Missing>>;
export function switchOn(
  selector: AnyConverter,
  branches: BranchTable<unknown, AnyConverter>,
  options: SwitchOptions<AnyConverter> = {}
): AnyConverter {
  const { default: fallback, handleMissingValue = false } = options;

  const lookup = new Map<unknown, AnyConverter>();
  if (isBranchMap(branches)) {
    for (const [key, branch] of branches) lookup.set(key, branch);
  } else {
    for (const [key, branch] of Object.entries(branches)) lookup.set(key, branch);
  }
  const byString = !isBranchMap(branches);
  if (lookup.size === 0) {
    console.warn("transmute: switchOn() called with an empty branch table");
  }

  return defineConverter((value: unknown, context) => {
    if (isMissing(value) && !handleMissingValue) {
      return ok(value);
    }

    const selected = selector.apply(value, context);
    if (!selected.ok) {
      return err(value, selected.error);
    }

    const key = selected.value;
    const matchable = !byString || typeof key === "string" || typeof key === "number";
    const branch = matchable ? lookup.get(byString ? String(key) : key) : undefined;
    if (branch) {
      return branch.apply(value, context);
    }
    if (fallback) {
      return fallback.apply(value, context);
    }
    return err(value, localize(context, MESSAGES.NO_MATCHING_BRANCH, { key: String(key) }));
  });
}
