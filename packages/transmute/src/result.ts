/**
 * transmute/result (internal)
 *
 * The (value, error) pair every converter returns, and the recursive error
 * tree that aggregation combinators build.
 */

// =============================================================================
// Absence
// =============================================================================

/**
 * "No value". Both `null` and `undefined` count as missing; converters that
 * produce absence themselves produce `null`.
 */
export type Missing = null | undefined;

/**
 * A value that may be missing.
 */
export type Maybe<T> = T | Missing;

/**
 * Checks if a value is missing (`null` or `undefined`).
 */
export const isMissing = (value: unknown): value is Missing =>
  value === null || value === undefined;

// =============================================================================
// Error Model
// =============================================================================

/**
 * Nested errors keyed like the value they describe: mapping keys for
 * struct-like values, stringified positions for sequences.
 */
export interface ErrorTree {
  readonly [key: string]: ConversionError;
}

/**
 * A protocol error: an atomic message or an error tree.
 */
export type ConversionError = string | ErrorTree;

/**
 * Checks if an error is a composite error tree.
 */
export const isErrorTree = (error: unknown): error is ErrorTree =>
  typeof error === "object" && error !== null && !Array.isArray(error);

// =============================================================================
// Conversion Types
// =============================================================================

/**
 * A successful conversion. `error` is always `null`.
 */
export type Converted<T> = {
  readonly ok: true;
  readonly value: T;
  readonly error: null;
};

/**
 * A failed conversion. `value` holds the best-effort value at the point of
 * failure, so invalid input stays inspectable.
 */
export type Failed<E extends ConversionError = ConversionError> = {
  readonly ok: false;
  readonly value: unknown;
  readonly error: E;
};

/**
 * The result of applying a converter.
 */
export type Conversion<T, E extends ConversionError = ConversionError> =
  | Converted<T>
  | Failed<E>;

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful conversion.
 */
export const ok = <T>(value: T): Converted<T> => ({ ok: true, value, error: null });

/**
 * Creates a failed conversion that keeps its best-effort value.
 */
export const err = <E extends ConversionError>(value: unknown, error: E): Failed<E> => ({
  ok: false,
  value,
  error,
});

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a conversion succeeded.
 */
export const isOk = <T>(result: Conversion<T>): result is Converted<T> => result.ok;

/**
 * Checks if a conversion failed.
 */
export const isErr = <T>(result: Conversion<T>): result is Failed => !result.ok;

/**
 * Checks if an unknown value is shaped like a conversion.
 */
export const isConversion = (value: unknown): value is Conversion<unknown> =>
  typeof value === "object" &&
  value !== null &&
  "ok" in value &&
  typeof value.ok === "boolean" &&
  "value" in value &&
  "error" in value;

/**
 * Returns the conversion as a `[value, error]` tuple.
 *
 * @example
 * ```typescript
 * const [value, error] = toPair(inputToInt.apply(' 42 '));
 * // value === 42, error === null
 * ```
 */
export function toPair<T>(
  result: Conversion<T>
): readonly [value: T, error: null] | readonly [value: unknown, error: ConversionError] {
  return result.ok ? [result.value, null] : [result.value, result.error];
}

// =============================================================================
// Error Tree Utilities
// =============================================================================

/**
 * Flattens an error tree into dotted paths.
 *
 * @example
 * ```typescript
 * flattenErrors({ address: { city: 'Missing value' }, tags: { 2: 'Too long' } });
 * // { 'address.city': 'Missing value', 'tags.2': 'Too long' }
 *
 * flattenErrors('Invalid'); // { '': 'Invalid' }
 * ```
 */
export function flattenErrors(error: ConversionError, prefix = ""): Record<string, string> {
  if (!isErrorTree(error)) {
    return { [prefix]: error };
  }
  const flat: Record<string, string> = {};
  for (const [key, child] of Object.entries(error)) {
    Object.assign(flat, flattenErrors(child, prefix ? `${prefix}.${key}` : key));
  }
  return flat;
}

/**
 * Renders an error for humans: messages as-is, trees as `path: message` lines
 * joined by `; `.
 */
export function formatError(error: ConversionError): string {
  if (!isErrorTree(error)) return error;
  return Object.entries(flattenErrors(error))
    .map(([path, message]) => (path ? `${path}: ${message}` : message))
    .join("; ");
}
