/**
 * transmute-base/collections
 *
 * Item access and reshaping of mappings and sequences.
 */

import {
  condition,
  defineConverter,
  err,
  isMapping,
  isMissing,
  localize,
  ok,
  pipe,
  resolveMessage,
  ShapeError,
  transform,
  uniformSequence,
  type AnyConverter,
  type ConversionContext,
  type ConversionError,
  type Converter,
  type Message,
  type Schema,
  type SequenceKind,
  type StructOutput,
  type TupleOutput,
  type Maybe,
} from "transmute";
import { BASE_MESSAGES } from "./messages";

// =============================================================================
// get()
// =============================================================================

export interface GetOptions {
  /** Returned when the key or index is absent, instead of an error. */
  default?: unknown;
  /** Error when the key or index is absent. */
  message?: Message<unknown>;
}

function lookup(container: unknown, key: string | number): { found: boolean; item?: unknown } {
  if (isMapping(container)) {
    const name = String(key);
    return Object.prototype.hasOwnProperty.call(container, name)
      ? { found: true, item: container[name] }
      : { found: false };
  }
  if (container instanceof Map) {
    return container.has(key) ? { found: true, item: container.get(key) } : { found: false };
  }
  if (Array.isArray(container) || typeof container === "string") {
    const items: ArrayLike<unknown> = container;
    if (typeof key !== "number" || !Number.isInteger(key)) return { found: false };
    const index = key < 0 ? items.length + key : key;
    return index >= 0 && index < items.length ? { found: true, item: items[index] } : { found: false };
  }
  throw new ShapeError({ converter: "get", expected: "a mapping, a map or a sequence", actual: container });
}

/**
 * Read one item of a mapping, `Map`, array or string. Negative indexes count
 * from the end.
 *
 * @example
 * ```typescript
 * get('a').apply({ a: 1, b: 2 });                  // ok(1)
 * get('c').apply({ a: 1, b: 2 });                  // err({ a: 1, b: 2 }, 'Unknown key: c')
 * get('c', { default: null }).apply({ a: 1 });     // ok(null)
 * get(-2).apply(['a', 'b']);                       // ok('a')
 * get(2).apply(['a', 'b']);                        // err(['a', 'b'], 'Index out of range: 2')
 * ```
 */
export function get(key: string | number, options: GetOptions = {}): Converter<unknown, unknown> {
  const hasDefault = "default" in options;
  return defineConverter((value: unknown, context: ConversionContext) => {
    if (isMissing(value)) return ok(value);
    const { found, item } = lookup(value, key);
    if (found) return ok(item);
    if (hasDefault) return ok(options.default);
    if (options.message !== undefined) return err(value, resolveMessage(options.message, value, context));
    const sequence = Array.isArray(value) || typeof value === "string";
    return err(
      value,
      sequence
        ? localize(context, BASE_MESSAGES.INDEX_OUT_OF_RANGE, { index: key })
        : localize(context, BASE_MESSAGES.UNKNOWN_KEY, { key })
    );
  });
}

// =============================================================================
// Reshaping
// =============================================================================

/**
 * Rename a key of a mapping, returning a copy. Absent keys leave the mapping
 * unchanged.
 *
 * @example
 * ```typescript
 * renameItem('a', 'c').apply({ a: 1, b: 2 }); // ok({ b: 2, c: 1 })
 * ```
 */
export function renameItem(oldKey: string, newKey: string): Converter<unknown, unknown> {
  return defineConverter((value: unknown) => {
    if (isMissing(value)) return ok(value);
    if (!isMapping(value)) {
      throw new ShapeError({ converter: "renameItem", expected: "a mapping", actual: value });
    }
    if (!Object.prototype.hasOwnProperty.call(value, oldKey)) return ok(value);
    const entries = Object.entries(value).filter(([key]) => key !== oldKey);
    entries.push([newKey, value[oldKey]]);
    return ok(Object.fromEntries(entries));
  });
}

function isCollection(value: unknown): boolean {
  return Array.isArray(value) || value instanceof Set;
}

/**
 * Unwrap a one-item array or set unless its item is itself an array or set.
 *
 * @example
 * ```typescript
 * extractWhenSingleton.apply([42]);     // ok(42)
 * extractWhenSingleton.apply([42, 43]); // ok([42, 43])
 * extractWhenSingleton.apply([[42]]);   // ok([[42]])
 * ```
 */
export const extractWhenSingleton: Converter<unknown, unknown> = transform((value: unknown) => {
  if (!Array.isArray(value) && !(value instanceof Set)) return value;
  const items: unknown[] = [...value];
  return items.length === 1 && !isCollection(items[0]) ? items[0] : value;
});

/**
 * Wrap a single item into an array (or a set); arrays and sets are kept as
 * a collection of the requested kind.
 *
 * @example
 * ```typescript
 * itemToSingleton().apply('a');           // ok(['a'])
 * itemToSingleton().apply(['a', 'b']);    // ok(['a', 'b'])
 * itemToSingleton('set').apply([1, 1]);   // ok(Set {1})
 * ```
 */
export function itemToSingleton(kind: SequenceKind = "array"): Converter<unknown, unknown> {
  return transform((value: unknown) => {
    if (kind === "array") {
      if (Array.isArray(value)) return value;
      return value instanceof Set ? [...value] : [value];
    }
    if (value instanceof Set) return value;
    return new Set(Array.isArray(value) ? value : [value]);
  });
}

export interface ItemOrSequenceOptions {
  /** @default "array" */
  kind?: SequenceKind;
  /** @default false */
  dropMissingItems?: boolean;
}

/**
 * Accept a single item or a sequence of items. Sequences are converted item
 * by item with `uniformSequence()` and a single converted item is unwrapped;
 * anything else goes straight to `converter`.
 *
 * @example
 * ```typescript
 * const ints = itemOrSequence(inputToInt);
 * ints.apply('42');          // ok(42)
 * ints.apply(['42']);        // ok(42)
 * ints.apply(['42', '43']);  // ok([42, 43])
 * ints.apply(['42', 'x']);   // err([42, 'x'], { 1: 'Value must be an integer' })
 * ```
 */
export function itemOrSequence(
  converter: AnyConverter,
  options: ItemOrSequenceOptions = {}
): Converter<unknown, unknown> {
  const { kind = "array", dropMissingItems = false } = options;
  const sequence: AnyConverter =
    kind === "set"
      ? uniformSequence(converter, { kind: "set", dropMissingItems })
      : uniformSequence(converter, { dropMissingItems });
  const isSequence = transform((value: unknown) => (kind === "set" ? value instanceof Set : Array.isArray(value)));
  return condition(isSequence, pipe(sequence, extractWhenSingleton), converter);
}

// =============================================================================
// Construction
// =============================================================================

export interface NewMappingOptions {
  /** Omit successful entries whose value is missing. @default false */
  dropMissingValues?: boolean;
  /** Build the mapping from a missing input too. @default false */
  handleMissingValue?: boolean;
}

/**
 * Build a mapping from any value: each converter receives the whole input
 * and fills the entry of its key.
 *
 * @example
 * ```typescript
 * const person = newMapping({
 *   name: get(0),
 *   age: pipe(get(1), testIsString(), inputToInt),
 * });
 *
 * person.apply(['John Doe', '72']); // ok({ name: 'John Doe', age: 72 })
 * person.apply(['John Doe']);       // err({ name: 'John Doe', age: ['John Doe'] }, { age: 'Index out of range: 1' })
 * ```
 */
export function newMapping<S extends Schema>(
  converters: S,
  options?: NewMappingOptions
): Converter<unknown, Maybe<StructOutput<S>>>;
export function newMapping(converters: Schema, options: NewMappingOptions = {}): AnyConverter {
  const { dropMissingValues = false, handleMissingValue = false } = options;
  return defineConverter((value: unknown, context: ConversionContext) => {
    if (isMissing(value) && !handleMissingValue) return ok(value);
    const entries: [string, unknown][] = [];
    const errors: [string, ConversionError][] = [];
    for (const [key, converter] of Object.entries(converters)) {
      const result = converter.apply(value, context);
      if (!result.ok) errors.push([key, result.error]);
      else if (dropMissingValues && isMissing(result.value)) continue;
      entries.push([key, result.value]);
    }
    const output = Object.fromEntries(entries);
    return errors.length > 0 ? err(output, Object.fromEntries(errors)) : ok(output);
  });
}

export interface NewSequenceOptions {
  /** Build the sequence from a missing input too. @default false */
  handleMissingValue?: boolean;
}

/**
 * Build an array from any value: the converter at each position receives
 * the whole input. Errors are keyed by position.
 *
 * @example
 * ```typescript
 * const row = newSequence([
 *   get('name', { default: null }),
 *   pipe(get('age', { default: null }), testIsString(), inputToInt),
 * ]);
 * row.apply({ age: '72', name: 'John Doe' }); // ok(['John Doe', 72])
 * ```
 */
export function newSequence<T extends readonly AnyConverter[]>(
  converters: readonly [...T],
  options?: NewSequenceOptions
): Converter<unknown, Maybe<TupleOutput<T>>>;
export function newSequence(converters: readonly AnyConverter[], options: NewSequenceOptions = {}): AnyConverter {
  const { handleMissingValue = false } = options;
  return defineConverter((value: unknown, context: ConversionContext) => {
    if (isMissing(value) && !handleMissingValue) return ok(value);
    const output: unknown[] = [];
    const errors: [string, ConversionError][] = [];
    converters.forEach((converter, index) => {
      const result = converter.apply(value, context);
      if (!result.ok) errors.push([String(index), result.error]);
      output.push(result.value);
    });
    return errors.length > 0 ? err(output, Object.fromEntries(errors)) : ok(output);
  });
}
