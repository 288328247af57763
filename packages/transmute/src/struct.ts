/**
 * transmute/struct
 *
 * Keyed and positional aggregation. Each declared key (or position) is
 * converted independently of the others; failures are collected into an
 * error tree that holds only the failing keys.
 */

import type { ConversionContext } from "./context";
import { defineConverter, type AnyConverter, type Converter, type OutputOf } from "./converter";
import { ShapeError } from "./errors";
import { noop } from "./leaves";
import { MESSAGES } from "./messages";
import {
  copyEntries,
  hasOwn,
  isMapping,
  setEntry,
  toErrorTree,
  type ErrorTreeBuilder,
  type Mapping,
} from "./records";
import { err, isErrorTree, isMissing, ok, type ConversionError, type Maybe } from "./result";

// =============================================================================
// Types
// =============================================================================

/**
 * What to do with input keys (or positions) the schema does not declare:
 *
 * - `"drop"`: omit them from value and errors
 * - `"passthrough"`: keep them unchanged
 * - `"reject"`: keep them and report `"Unexpected item"`
 * - a converter: convert them like a declared entry
 */
export type UnexpectedPolicy = "drop" | "passthrough" | "reject" | AnyConverter;

/**
 * Converters by key.
 */
export type Schema = Readonly<Record<string, AnyConverter>>;

export type StructOutput<S extends Schema> = { [K in keyof S]: OutputOf<S[K]> };

export type TupleOutput<T extends readonly AnyConverter[]> = { [K in keyof T]: OutputOf<T[K]> };

export interface StructOptions {
  /** Policy for keys absent from the schema. @default "reject" */
  unexpected?: UnexpectedPolicy;
  /**
   * Omit successful entries whose value is missing. `"missing"` only omits
   * declared keys that were absent from the input. @default false
   */
  dropMissingValues?: boolean | "missing";
  /** Do not run converters for declared keys absent from the input. @default false */
  skipMissingKeys?: boolean;
}

export interface TupleOptions {
  /** Policy for items past the last converter. @default "reject" */
  unexpected?: UnexpectedPolicy;
}

/** Value and error of one entry; `error` is `null` on success. */
type Entry = { value: unknown; error: ConversionError | null };

function convertUnexpected(
  policy: Exclude<UnexpectedPolicy, "drop">,
  item: unknown,
  context: ConversionContext
): Entry {
  if (policy === "passthrough") {
    return { value: item, error: null };
  }
  if (policy === "reject") {
    return { value: item, error: context.translate(MESSAGES.UNEXPECTED_ITEM) };
  }
  const result = policy.apply(item, context);
  return { value: result.value, error: result.ok ? null : result.error };
}

// =============================================================================
// struct()
// =============================================================================

/**
 * Convert a mapping key by key.
 *
 * Declared keys come first in schema order (a key absent from the input is
 * converted from `null`), then the surviving unexpected keys in input order.
 * The output is a plain object, so integer-like keys such as `"2"` are
 * listed first in ascending order whatever their schema position.
 * A missing input converts to itself; any other non-mapping input throws
 * `ShapeError`.
 *
 * @example
 * ```typescript
 * const signup = struct({
 *   username: pipe(cleanupLine, required()),
 *   email: inputToEmail,
 * });
 *
 * signup.apply({ username: '  John Doe', email: 'John@DOE.name' });
 * // ok({ username: 'John Doe', email: 'john@doe.name' })
 *
 * signup.apply({ email: 'john', admin: true });
 * // err(
 * //   { username: null, email: 'john', admin: true },
 * //   { username: 'Missing value', email: 'An email must contain exactly one "@"', admin: 'Unexpected item' }
 * // )
 * ```
 */
export function struct<S extends Schema>(
  schema: S,
  options?: StructOptions
): Converter<Maybe<Mapping>, Maybe<StructOutput<S>>>;
export function struct(schema: Schema, options: StructOptions = {}): AnyConverter {
  const { unexpected = "reject", dropMissingValues = false, skipMissingKeys = false } = options;
  const declared = Object.keys(schema);
  if (declared.length === 0 && (unexpected === "drop" || unexpected === "reject")) {
    console.warn("transmute: struct() called with an empty schema");
  }

  return defineConverter((value: unknown, context) => {
    if (isMissing(value)) {
      return ok(value);
    }
    if (!isMapping(value)) {
      throw new ShapeError({ converter: "struct", expected: "a mapping", actual: value });
    }

    const output: Record<string, unknown> = {};
    const errors: ErrorTreeBuilder = {};

    for (const key of declared) {
      const present = hasOwn(value, key);
      if (!present && skipMissingKeys) continue;

      const result = schema[key].apply(present ? value[key] : null, context);
      if (!result.ok) {
        setEntry(output, key, result.value);
        setEntry(errors, key, result.error);
        continue;
      }
      if (
        isMissing(result.value) &&
        (dropMissingValues === true || (dropMissingValues === "missing" && !present))
      ) {
        continue;
      }
      setEntry(output, key, result.value);
    }

    if (unexpected !== "drop") {
      for (const key of Object.keys(value)) {
        if (hasOwn(schema, key)) continue;
        const entry = convertUnexpected(unexpected, value[key], context);
        if (entry.error !== null) {
          setEntry(errors, key, entry.error);
        } else if (dropMissingValues === true && isMissing(entry.value)) {
          continue;
        }
        setEntry(output, key, entry.value);
      }
    }

    const tree = toErrorTree(errors);
    return tree ? err(output, tree) : ok(output);
  });
}

// =============================================================================
// tuple()
// =============================================================================

/**
 * Convert an array position by position. Positions past the input's end are
 * converted from `null`; items past the last converter follow `unexpected`.
 * Errors are keyed by stringified index.
 *
 * @example
 * ```typescript
 * const point = tuple([inputToFloat, inputToFloat]);
 * point.apply(['1.5', '2']);   // ok([1.5, 2])
 * point.apply(['1.5', 'x']);   // err([1.5, 'x'], { 1: 'Value must be a float' })
 * point.apply(['1', '2', '3']); // err([1, 2, '3'], { 2: 'Unexpected item' })
 * ```
 */
export function tuple<T extends readonly AnyConverter[]>(
  converters: readonly [...T],
  options?: TupleOptions
): Converter<Maybe<readonly unknown[]>, Maybe<TupleOutput<T>>>;
export function tuple(converters: readonly AnyConverter[], options: TupleOptions = {}): AnyConverter {
  const { unexpected = "reject" } = options;

  return defineConverter((value: unknown, context) => {
    if (isMissing(value)) {
      return ok(value);
    }
    if (!Array.isArray(value)) {
      throw new ShapeError({ converter: "tuple", expected: "an array", actual: value });
    }
    const items: readonly unknown[] = value;

    const output: unknown[] = [];
    const errors: ErrorTreeBuilder = {};

    converters.forEach((converter, index) => {
      const result = converter.apply(index < items.length ? items[index] : null, context);
      if (!result.ok) {
        errors[String(index)] = result.error;
      }
      output.push(result.value);
    });

    if (unexpected !== "drop") {
      for (let index = converters.length; index < items.length; index++) {
        const entry = convertUnexpected(unexpected, items[index], context);
        if (entry.error !== null) {
          errors[String(output.length)] = entry.error;
        }
        output.push(entry.value);
      }
    }

    const tree = toErrorTree(errors);
    return tree ? err(output, tree) : ok(output);
  });
}

// =============================================================================
// merge() / submapping()
// =============================================================================

/**
 * Apply several mapping converters to the same input and merge their values
 * and error trees (later converters win on shared keys). A converter that
 * returns an atomic error ends the merge with its own result; a successful
 * non-mapping value throws `ShapeError`.
 *
 * @example
 * ```typescript
 * const ab = struct({ a: inputToInt, b: inputToFloat }, { unexpected: 'drop' });
 * const c = struct({ c: inputToEmail }, { unexpected: 'drop' });
 *
 * merge(ab, c).apply({ a: '1', b: '2', c: 'john@doe.name' });
 * // ok({ a: 1, b: 2, c: 'john@doe.name' })
 * ```
 */
export function merge(...converters: AnyConverter[]): Converter<Maybe<Mapping>, Maybe<Mapping>> {
  return defineConverter<Maybe<Mapping>, Maybe<Mapping>>((value: Maybe<Mapping>, context) => {
    if (isMissing(value)) {
      return ok(value);
    }

    let mergedValue: Record<string, unknown> | null = null;
    let mergedErrors: ErrorTreeBuilder | null = null;

    for (const converter of converters) {
      const result = converter.apply(value, context);
      if (!result.ok) {
        if (!isErrorTree(result.error)) return result;
        mergedErrors ??= {};
        copyEntries(mergedErrors, result.error);
      }
      if (!isMissing(result.value)) {
        if (!isMapping(result.value)) {
          if (!result.ok) return result;
          throw new ShapeError({ converter: "merge", expected: "a mapping", actual: result.value });
        }
        mergedValue ??= {};
        copyEntries(mergedValue, result.value);
      }
    }

    return mergedErrors ? err(mergedValue, mergedErrors) : ok(mergedValue);
  });
}

function mergeErrors(first: ConversionError | null, second: ConversionError | null): ConversionError | null {
  if (first === null) return second;
  if (second === null) return first;
  if (isErrorTree(first) && isErrorTree(second)) {
    const merged: ErrorTreeBuilder = {};
    copyEntries(merged, first);
    copyEntries(merged, second);
    return merged;
  }
  // Incompatible shapes: the first error wins.
  return first;
}

/**
 * Split a mapping into the entries named by `keys` and the remaining ones,
 * convert both parts separately, then merge the results. Remaining entries
 * pass through unchanged without `remainingConverter`.
 *
 * @example
 * ```typescript
 * const toPoint = transform((part: Mapping) => ({ point: [part.x, part.y] }));
 *
 * submapping(['x', 'y'], toPoint).apply({ x: 1, y: 2, label: 'A' });
 * // ok({ point: [1, 2], label: 'A' })
 * ```
 */
export function submapping(
  keys: readonly string[],
  converter: AnyConverter,
  remainingConverter: AnyConverter = noop()
): Converter<Maybe<Mapping>, Maybe<Mapping>> {
  const selected = new Set(keys);

  return defineConverter((value: Maybe<Mapping>, context) => {
    if (isMissing(value)) {
      return ok(value);
    }
    if (!isMapping(value)) {
      throw new ShapeError({ converter: "submapping", expected: "a mapping", actual: value });
    }

    const part: Record<string, unknown> = {};
    const remaining: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      setEntry(selected.has(key) ? part : remaining, key, item);
    }

    const partResult = converter.apply(part, context);
    const remainingResult = remainingConverter.apply(remaining, context);

    const merged: Record<string, unknown> = {};
    for (const result of [partResult, remainingResult]) {
      if (isMissing(result.value)) continue;
      if (!isMapping(result.value)) {
        throw new ShapeError({ converter: "submapping", expected: "a mapping", actual: result.value });
      }
      copyEntries(merged, result.value);
    }

    const error = mergeErrors(partResult.error, remainingResult.error);
    return error === null ? ok(merged) : err(merged, error);
  });
}
