/**
 * transmute/pipe
 *
 * Sequential, fail-fast composition of converters.
 */

import { defineConverter, type AnyConverter, type Converter } from "./converter";
import { ok, type Conversion } from "./result";

// =============================================================================
// Composition
// =============================================================================

/**
 * Chain converters left-to-right. Each stage receives the previous stage's
 * value; the first failing stage's result is returned as-is and later stages
 * never run. `pipe()` is the identity.
 *
 * @example
 * ```typescript
 * const username = pipe(cleanupLine, required());
 *
 * username.apply('  John Doe'); // ok('John Doe')
 * username.apply('   ');        // err(null, 'Missing value')
 * username.apply(null);         // err(null, 'Missing value')
 * ```
 */
export function pipe<A = unknown>(): Converter<A, A>;
export function pipe<A, B>(ab: Converter<A, B>): Converter<A, B>;
export function pipe<A, B, C>(ab: Converter<A, B>, bc: Converter<B, C>): Converter<A, C>;
export function pipe<A, B, C, D>(
  ab: Converter<A, B>,
  bc: Converter<B, C>,
  cd: Converter<C, D>
): Converter<A, D>;
export function pipe<A, B, C, D, E>(
  ab: Converter<A, B>,
  bc: Converter<B, C>,
  cd: Converter<C, D>,
  de: Converter<D, E>
): Converter<A, E>;
export function pipe<A, B, C, D, E, F>(
  ab: Converter<A, B>,
  bc: Converter<B, C>,
  cd: Converter<C, D>,
  de: Converter<D, E>,
  ef: Converter<E, F>
): Converter<A, F>;
export function pipe<A, B, C, D, E, F, G>(
  ab: Converter<A, B>,
  bc: Converter<B, C>,
  cd: Converter<C, D>,
  de: Converter<D, E>,
  ef: Converter<E, F>,
  fg: Converter<F, G>
): Converter<A, G>;
export function pipe<A, B, C, D, E, F, G, H>(
  ab: Converter<A, B>,
  bc: Converter<B, C>,
  cd: Converter<C, D>,
  de: Converter<D, E>,
  ef: Converter<E, F>,
  fg: Converter<F, G>,
  gh: Converter<G, H>
): Converter<A, H>;
export function pipe<A, B, C, D, E, F, G, H, I>(
  ab: Converter<A, B>,
  bc: Converter<B, C>,
  cd: Converter<C, D>,
  de: Converter<D, E>,
  ef: Converter<E, F>,
  fg: Converter<F, G>,
  gh: Converter<G, H>,
  hi: Converter<H, I>
): Converter<A, I>;
export function pipe(...converters: AnyConverter[]): AnyConverter;
export function pipe(...converters: AnyConverter[]): AnyConverter {
  return defineConverter((value: unknown, context) => {
    let result: Conversion<unknown> = ok(value);
    for (const converter of converters) {
      result = converter.apply(result.value, context);
      if (!result.ok) {
        return result;
      }
    }
    return result;
  });
}
