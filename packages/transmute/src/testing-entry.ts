/**
 * transmute/testing
 *
 * Probes and assertions for converter tests.
 *
 * @example
 * ```typescript
 * import { createProbe, expectFailed } from 'transmute/testing';
 *
 * const later = createProbe();
 * const result = pipe(required(), later).apply(null);
 *
 * expectFailed(result);
 * expect(result.error).toBe('Missing value');
 * expect(later.callCount).toBe(0);
 * ```
 */

export {
  // Types
  type Probe,
  type ProbeCall,

  // Probes
  createProbe,

  // Conversion Assertions (throw on mismatch, provide type narrowing)
  expectConverted,
  expectFailed,

  // Debug Helpers
  formatConversion,
} from "./testing";
