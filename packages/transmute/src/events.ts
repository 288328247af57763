/**
 * transmute/events
 *
 * Conversion events. Nothing is logged by the library itself: a `traced()`
 * converter reports to `context.onEvent`, and the caller decides where the
 * events go.
 *
 * @example
 * ```typescript
 * const context = createContext({
 *   onEvent: (event) => {
 *     if (event.type === 'convert_error') {
 *       console.log(`${event.name} failed in ${event.durationMs}ms`, event.error);
 *     }
 *   },
 * });
 *
 * traced('signup', signupConverter).apply(form, context);
 * ```
 */

import type { ConversionError } from "./result";
import { defineConverter, type Converter } from "./converter";

// =============================================================================
// Event Types
// =============================================================================

export type ConversionEvent =
  | { type: "convert_start"; name: string; ts: number }
  | { type: "convert_success"; name: string; ts: number; durationMs: number }
  | {
      type: "convert_error";
      name: string;
      ts: number;
      durationMs: number;
      error: ConversionError;
    };

export type ConversionEventType = ConversionEvent["type"];

// =============================================================================
// traced()
// =============================================================================

/**
 * Wrap a converter so each call emits `convert_start`, then
 * `convert_success` or `convert_error`, to `context.onEvent`.
 *
 * The wrapped converter's result is returned unchanged. When the context has
 * no listener the wrapper adds nothing but a property lookup.
 */
export function traced<I, O>(name: string, converter: Converter<I, O>): Converter<I, O> {
  return defineConverter((value: I, context) => {
    const onEvent = context.onEvent;
    if (!onEvent) {
      return converter.apply(value, context);
    }

    const startTs = Date.now();
    onEvent({ type: "convert_start", name, ts: startTs });

    const result = converter.apply(value, context);
    const ts = Date.now();
    if (result.ok) {
      onEvent({ type: "convert_success", name, ts, durationMs: ts - startTs });
    } else {
      onEvent({ type: "convert_error", name, ts, durationMs: ts - startTs, error: result.error });
    }
    return result;
  });
}

/**
 * Format an event as a single line for debugging.
 */
export function formatEvent(event: ConversionEvent): string {
  switch (event.type) {
    case "convert_start":
      return `[${event.name}] start`;
    case "convert_success":
      return `[${event.name}] ok (${event.durationMs}ms)`;
    case "convert_error":
      return `[${event.name}] error (${event.durationMs}ms): ${
        typeof event.error === "string" ? event.error : JSON.stringify(event.error)
      }`;
  }
}
