/**
 * transmute/uniform
 *
 * Homogeneous aggregation: one converter applied to every entry of a mapping
 * or every item of a sequence.
 */

import { defineConverter, type AnyConverter, type Converter } from "./converter";
import { ShapeError } from "./errors";
import { isMapping, setEntry, toErrorTree, type ErrorTreeBuilder } from "./records";
import { err, isMissing, ok, type Maybe } from "./result";

// =============================================================================
// uniformMapping()
// =============================================================================

export interface UniformMappingOptions {
  /**
   * Converts each key. Keys must convert to a string or a number; entries
   * whose key converts to a missing value are dropped.
   */
  keyConverter?: AnyConverter;
  /** Omit successful entries whose converted value is missing. @default false */
  dropMissingValues?: boolean;
}

/**
 * Convert every entry of a mapping with `valueConverter`.
 *
 * A key conversion failure is reported under the original key, which keeps
 * the raw value, and the value converter is not run. Value failures are
 * reported under the output key.
 *
 * @example
 * ```typescript
 * const scores = uniformMapping(inputToInt, { keyConverter: cleanupLine });
 *
 * scores.apply({ ' alice ': '12', bob: '7' }); // ok({ alice: 12, bob: 7 })
 * scores.apply({ alice: '12', bob: 'x' });     // err({ alice: 12, bob: 'x' }, { bob: 'Value must be an integer' })
 * ```
 */
export function uniformMapping<I, O>(
  valueConverter: Converter<I, O>,
  options?: UniformMappingOptions
): Converter<Maybe<Readonly<Record<string, I>>>, Maybe<Record<string, O>>>;
export function uniformMapping(
  valueConverter: AnyConverter,
  options: UniformMappingOptions = {}
): AnyConverter {
  const { keyConverter, dropMissingValues = false } = options;

  return defineConverter((value: unknown, context) => {
    if (isMissing(value)) {
      return ok(value);
    }
    if (!isMapping(value)) {
      throw new ShapeError({ converter: "uniformMapping", expected: "a mapping", actual: value });
    }

    const output: Record<string, unknown> = {};
    const errors: ErrorTreeBuilder = {};

    for (const [key, item] of Object.entries(value)) {
      let outputKey = key;
      if (keyConverter) {
        const keyResult = keyConverter.apply(key, context);
        if (!keyResult.ok) {
          setEntry(output, key, item);
          setEntry(errors, key, keyResult.error);
          continue;
        }
        if (isMissing(keyResult.value)) continue;
        if (typeof keyResult.value !== "string" && typeof keyResult.value !== "number") {
          throw new ShapeError({
            converter: "uniformMapping",
            expected: "a string or number key",
            actual: keyResult.value,
          });
        }
        outputKey = String(keyResult.value);
      }

      const result = valueConverter.apply(item, context);
      if (!result.ok) {
        setEntry(errors, outputKey, result.error);
      } else if (dropMissingValues && isMissing(result.value)) {
        continue;
      }
      setEntry(output, outputKey, result.value);
    }

    const tree = toErrorTree(errors);
    return tree ? err(output, tree) : ok(output);
  });
}

// =============================================================================
// uniformSequence()
// =============================================================================

/**
 * Output container of `uniformSequence()`.
 */
export type SequenceKind = "array" | "set";

export interface UniformSequenceOptions<K extends SequenceKind = SequenceKind> {
  /** `"array"` keeps order and duplicates; `"set"` drops duplicates. @default "array" */
  kind?: K;
  /** Omit successful items whose converted value is missing. @default false */
  dropMissingItems?: boolean;
}

/**
 * Accepted sequence input: an array or a set.
 */
export type SequenceInput<I> = readonly I[] | ReadonlySet<I>;

/**
 * Convert every item of an array or set with `itemConverter`.
 *
 * Errors form a sparse record from index to error. The index is the item's
 * position among the converted items: dropped missing items do not count, and
 * for `kind: "set"` positions are taken before duplicates are removed, so an
 * error key may be past the end of the resulting set.
 *
 * @example
 * ```typescript
 * const ids = uniformSequence(inputToInt, { dropMissingItems: true });
 *
 * ids.apply(['1', ' ', '3']);  // ok([1, 3])
 * ids.apply(['1', 'x', '3']);  // err([1, 'x', 3], { 1: 'Value must be an integer' })
 *
 * uniformSequence(noop(), { kind: 'set' }).apply([1, 1, 2]); // ok(Set {1, 2})
 * uniformSequence(inputToInt, { kind: 'set' }).apply(['1', '1', 'x']);
 * // err(Set {1, 'x'}, { 2: 'Value must be an integer' })
 * ```
 */
export function uniformSequence<I, O>(
  itemConverter: Converter<I, O>,
  options?: UniformSequenceOptions<"array">
): Converter<Maybe<SequenceInput<I>>, Maybe<O[]>>;
export function uniformSequence<I, O>(
  itemConverter: Converter<I, O>,
  options: UniformSequenceOptions<"set">
): Converter<Maybe<SequenceInput<I>>, Maybe<Set<O>>>;
export function uniformSequence(
  itemConverter: AnyConverter,
  options: UniformSequenceOptions = {}
): AnyConverter {
  const { kind = "array", dropMissingItems = false } = options;

  return defineConverter((value: unknown, context) => {
    if (isMissing(value)) {
      return ok(value);
    }
    if (!Array.isArray(value) && !(value instanceof Set)) {
      throw new ShapeError({ converter: "uniformSequence", expected: "an array or a set", actual: value });
    }
    const items: Iterable<unknown> = value;

    const converted: unknown[] = [];
    const errors: ErrorTreeBuilder = {};

    for (const item of items) {
      const result = itemConverter.apply(item, context);
      if (!result.ok) {
        errors[String(converted.length)] = result.error;
      } else if (dropMissingItems && isMissing(result.value)) {
        continue;
      }
      converted.push(result.value);
    }

    const output = kind === "set" ? new Set(converted) : converted;
    const tree = toErrorTree(errors);
    return tree ? err(output, tree) : ok(output);
  });
}
