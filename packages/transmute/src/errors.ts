/**
 * transmute/errors
 *
 * Fatal conditions. Invalid input is reported through the `error` slot of a
 * conversion; these are thrown for misuse that no converter should turn into
 * a validation message.
 *
 * @example
 * ```typescript
 * try {
 *   const user = check(userConverter)(form);
 * } catch (error) {
 *   if (isConversionCheckError(error)) {
 *     return badRequest(flattenErrors(error.error));
 *   }
 *   throw error;
 * }
 * ```
 */

import { formatError, type ConversionError } from "./result";

// =============================================================================
// Value Descriptions
// =============================================================================

/**
 * Short type name used in error messages: `null`, `array`, `set`, `map`,
 * or the `typeof` name.
 */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Set) return "set";
  if (value instanceof Map) return "map";
  return typeof value;
}

/**
 * Format a value for display in messages (strings quoted, long collections
 * abbreviated).
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") return `'${value}'`;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "function") return `[Function: ${value.name || "anonymous"}]`;
  if (Array.isArray(value)) {
    if (value.length <= 3) return `[${value.map(describeValue).join(", ")}]`;
    return `[${value.slice(0, 3).map(describeValue).join(", ")}, ... (${value.length} items)]`;
  }
  if (value instanceof Set) return `Set(${describeValue([...value])})`;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") {
    const entries = Object.entries(value);
    if (entries.length === 0) return "{}";
    const shown = entries.slice(0, 4).map(([key, item]) => `${key}: ${describeValue(item)}`);
    if (entries.length > 4) shown.push(`... (${entries.length} keys)`);
    return `{ ${shown.join(", ")} }`;
  }
  return String(value);
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Thrown by `check()` when a conversion failed.
 *
 * @example
 * ```typescript
 * check(inputToInt.apply('abc'));
 * // ConversionCheckError: Value must be an integer for: 'abc'
 * ```
 */
export class ConversionCheckError extends Error {
  readonly _tag = "ConversionCheckError" as const;

  constructor(
    public readonly error: ConversionError,
    public readonly value: unknown
  ) {
    super(`${formatError(error)} for: ${describeValue(value)}`);
    this.name = "ConversionCheckError";
  }
}

/**
 * Thrown when an aggregation combinator receives a value of the wrong shape,
 * such as an array given to `struct()`. Guard with a shape test earlier in a
 * pipe to report it as a validation error instead.
 */
export class ShapeError extends Error {
  readonly _tag = "ShapeError" as const;

  /** Combinator that rejected the value. */
  readonly converter: string;
  /** Expected shape, e.g. `"mapping"`. */
  readonly expected: string;
  /** The offending value. */
  readonly actual: unknown;

  constructor(props: { converter: string; expected: string; actual: unknown }) {
    super(`${props.converter} expected ${props.expected}, got ${describeType(props.actual)}`);
    this.name = "ShapeError";
    this.converter = props.converter;
    this.expected = props.expected;
    this.actual = props.actual;
  }
}

export type TransmuteError = ConversionCheckError | ShapeError;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if an error was thrown by `check()`.
 */
export const isConversionCheckError = (error: unknown): error is ConversionCheckError =>
  error instanceof ConversionCheckError;

/**
 * Checks if an error is a shape mismatch from an aggregation combinator.
 */
export const isShapeError = (error: unknown): error is ShapeError => error instanceof ShapeError;

/**
 * Checks if an error is any fatal error raised by the library itself.
 */
export const isTransmuteError = (error: unknown): error is TransmuteError =>
  isConversionCheckError(error) || isShapeError(error);
