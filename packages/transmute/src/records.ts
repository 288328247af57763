/**
 * transmute/records (internal)
 *
 * Plain-object helpers shared by the aggregation combinators.
 */

import type { ConversionError } from "./result";

/**
 * A mapping-shaped value: a plain object keyed by strings.
 */
export type Mapping = Readonly<Record<string, unknown>>;

/**
 * Checks if a value is a plain object (prototype `Object.prototype` or `null`).
 */
export function isMapping(value: unknown): value is Mapping {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function hasOwn(target: object, key: PropertyKey): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

/**
 * Define an own enumerable entry. Unlike assignment, a `__proto__` key
 * becomes a regular entry.
 */
export function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Mutable error tree under construction.
 */
export type ErrorTreeBuilder = Record<string, ConversionError>;

/**
 * Returns the collected errors, or `null` when nothing failed.
 */
export function toErrorTree(errors: ErrorTreeBuilder): ErrorTreeBuilder | null {
  return Object.keys(errors).length > 0 ? errors : null;
}

/**
 * Copy the own enumerable entries of `source` into `target` with `setEntry`.
 */
export function copyEntries<T>(target: Record<string, T>, source: Readonly<Record<string, T>>): void {
  for (const [key, value] of Object.entries(source)) {
    setEntry(target, key, value);
  }
}
