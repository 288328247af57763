/**
 * transmute/context
 *
 * The read-only object threaded through every `apply` call. It carries the
 * translation function leaf converters use for their messages, optional
 * extension data, and the event listener used by `traced()`.
 */

import type { ConversionEvent } from "./events";

// =============================================================================
// Types
// =============================================================================

/**
 * Maps a message key to localized text.
 */
export type Translator = (message: string) => string;

/**
 * Values interpolated into `{name}` placeholders.
 */
export type MessageParams = Readonly<Record<string, string | number | boolean>>;

/**
 * Read-only conversion context. Converters read it, never mutate it; one
 * instance may be shared by any number of concurrent conversions.
 */
export interface ConversionContext {
  /** Localizes a message key. Identity in the default context. */
  readonly translate: Translator;

  /** Locale tag the translator targets, when known. */
  readonly locale?: string;

  /** Extension data for domain converters (request info, tenant, ...). */
  readonly data: Readonly<Record<string, unknown>>;

  /** Receives events from `traced()` converters. */
  readonly onEvent?: (event: ConversionEvent) => void;
}

/**
 * Options for `createContext()`.
 */
export interface ContextOptions {
  translate?: Translator;
  locale?: string;
  data?: Record<string, unknown>;
  onEvent?: (event: ConversionEvent) => void;
}

// =============================================================================
// Construction
// =============================================================================

const identity: Translator = (message) => message;

/**
 * Create a frozen conversion context.
 *
 * @example
 * ```typescript
 * const context = createContext({
 *   locale: 'fr',
 *   translate: catalogTranslator({ 'Missing value': 'Valeur manquante' }),
 * });
 *
 * required().apply(null, context); // err(null, 'Valeur manquante')
 * ```
 */
export function createContext(options: ContextOptions = {}): ConversionContext {
  return Object.freeze({
    translate: options.translate ?? identity,
    ...(options.locale !== undefined ? { locale: options.locale } : {}),
    data: Object.freeze({ ...options.data }),
    ...(options.onEvent ? { onEvent: options.onEvent } : {}),
  });
}

/**
 * The context `apply` falls back to when none is given: identity translation,
 * no data, no listener. Frozen, so it cannot become hidden global state.
 */
export const defaultContext: ConversionContext = createContext();

/**
 * Build a translator from a flat message catalog. Unknown keys are returned
 * untranslated.
 */
export function catalogTranslator(catalog: Readonly<Record<string, string>>): Translator {
  return (message) =>
    Object.prototype.hasOwnProperty.call(catalog, message) ? catalog[message] ?? message : message;
}

// =============================================================================
// Messages
// =============================================================================

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Replace `{name}` placeholders with params. Unknown placeholders are left
 * in place.
 *
 * @example
 * ```typescript
 * formatMessage('Value must be between {min} and {max}', { min: 0, max: 9 });
 * // 'Value must be between 0 and 9'
 * ```
 */
export function formatMessage(template: string, params?: MessageParams): string {
  if (!params) return template;
  return template.replace(PLACEHOLDER, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(params, name) ? String(params[name]) : placeholder
  );
}

/**
 * Translate a message key through the context, then interpolate params.
 * Translation happens first so catalogs are keyed by the raw template.
 */
export function localize(
  context: ConversionContext,
  message: string,
  params?: MessageParams
): string {
  return formatMessage(context.translate(message), params);
}
