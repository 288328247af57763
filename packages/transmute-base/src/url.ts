/**
 * transmute-base/url
 *
 * URL cleanup on a plain split into scheme, authority, path, query and
 * fragment. No network access and no percent-decoding.
 */

import {
  defineConverter,
  err,
  isMissing,
  localize,
  ok,
  pipe,
  type Converter,
  type ConversionContext,
  type Maybe,
  type Missing,
} from "transmute";
import { BASE_MESSAGES } from "./messages";
import { cleanupLine } from "./text";

// =============================================================================
// Split & Join
// =============================================================================

/**
 * The five components of a URL. Absent components are empty strings.
 */
export interface UrlParts {
  scheme: string;
  authority: string;
  path: string;
  query: string;
  fragment: string;
}

const URL_PATTERN = /^(?:([A-Za-z][A-Za-z0-9+.-]*):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#([\s\S]*))?$/;
const AUTHORITY_SCHEMES = new Set(["ftp", "http", "https", "ws", "wss"]);

/**
 * Split a URL into its components, or return `null` when its authority has
 * unbalanced brackets.
 *
 * @example
 * ```typescript
 * splitUrl('http://example.org/a?b#c');
 * // { scheme: 'http', authority: 'example.org', path: '/a', query: 'b', fragment: 'c' }
 * ```
 */
export function splitUrl(url: string): UrlParts | null {
  const match = URL_PATTERN.exec(url);
  if (!match) return null;
  const [, scheme = "", authority = "", path = "", query = "", fragment = ""] = match;
  if (authority.includes("[") !== authority.includes("]")) return null;
  return { scheme, authority, path, query, fragment };
}

/**
 * Join components back into a URL.
 */
export function joinUrl(parts: UrlParts): string {
  let url = parts.path;
  if (parts.authority || (AUTHORITY_SCHEMES.has(parts.scheme) && !url.startsWith("//"))) {
    if (url && !url.startsWith("/")) url = `/${url}`;
    url = `//${parts.authority}${url}`;
  }
  if (parts.scheme) url = `${parts.scheme}:${url}`;
  if (parts.query) url += `?${parts.query}`;
  if (parts.fragment) url += `#${parts.fragment}`;
  return url;
}

// =============================================================================
// Converters
// =============================================================================

export interface UrlOptions {
  /** Prefix tried when `full` is set and the URL has neither scheme nor authority. */
  addPrefix?: string;
  errorIfFragment?: boolean;
  errorIfPath?: boolean;
  errorIfQuery?: boolean;
  /** Require a scheme. @default false */
  full?: boolean;
  removeFragment?: boolean;
  /** Replace any path by `/`. */
  removePath?: boolean;
  removeQuery?: boolean;
  /** Accepted schemes; `null` accepts any. @default ["http", "https"] */
  schemes?: readonly string[] | null;
}

/**
 * Build a converter that validates and cleans up a URL string. Scheme and
 * authority are lower-cased; `http` and `https` URLs always get at least a
 * `/` path.
 *
 * @example
 * ```typescript
 * makeStrToUrl().apply('HTTP://Example.org');                       // ok('http://example.org/')
 * makeStrToUrl({ full: true }).apply('example.org/a');              // err('example.org/a', 'URL must be complete')
 * makeStrToUrl({ full: true, addPrefix: 'http://' }).apply('example.org/a'); // ok('http://example.org/a')
 * makeStrToUrl({ removeQuery: true }).apply('http://example.org/a?b=1');     // ok('http://example.org/a')
 * ```
 */
export function makeStrToUrl(options: UrlOptions = {}): Converter<Maybe<string>, string | Missing> {
  const {
    addPrefix,
    errorIfFragment = false,
    errorIfPath = false,
    errorIfQuery = false,
    full = false,
    removeFragment = false,
    removePath = false,
    removeQuery = false,
    schemes = ["http", "https"],
  } = options;
  const accepted = schemes === null ? null : new Set(schemes);

  return defineConverter((value: Maybe<string>, context: ConversionContext) => {
    if (isMissing(value)) return ok(value);

    let parts = splitUrl(value);
    if (!parts) return err(value, localize(context, BASE_MESSAGES.INVALID_URL));
    if (full && addPrefix && !parts.scheme && !parts.authority && parts.path && !parts.path.startsWith("/")) {
      parts = splitUrl(addPrefix + value);
      if (!parts) return err(value, localize(context, BASE_MESSAGES.INVALID_URL));
    }

    const scheme = parts.scheme.toLowerCase();
    parts.scheme = scheme;
    parts.authority = parts.authority.toLowerCase();
    if (full && !scheme) return err(value, localize(context, BASE_MESSAGES.URL_NOT_COMPLETE));
    if (scheme && accepted && !accepted.has(scheme)) {
      return err(
        value,
        localize(context, BASE_MESSAGES.URL_BAD_SCHEME, { schemes: [...accepted].sort().join(", ") })
      );
    }

    if (parts.path && parts.path !== "/") {
      if (errorIfPath) return err(value, localize(context, BASE_MESSAGES.URL_WITH_PATH));
      if (removePath) parts.path = "/";
    }
    if ((scheme === "http" || scheme === "https") && !parts.path) {
      parts.path = "/";
    }
    if (parts.query) {
      if (errorIfQuery) return err(value, localize(context, BASE_MESSAGES.URL_WITH_QUERY));
      if (removeQuery) parts.query = "";
    }
    if (parts.fragment) {
      if (errorIfFragment) return err(value, localize(context, BASE_MESSAGES.URL_WITH_FRAGMENT));
      if (removeFragment) parts.fragment = "";
    }
    return ok(joinUrl(parts));
  });
}

/**
 * `cleanupLine` then `makeStrToUrl(options)`.
 */
export function makeInputToUrl(options: UrlOptions = {}): Converter<Maybe<string>, string | Missing> {
  return pipe(cleanupLine, makeStrToUrl(options));
}

/**
 * Keep only the path and query of a relative URL; the fragment is dropped.
 *
 * @example
 * ```typescript
 * strToUrlPathAndQuery.apply('/docs/search.html?q=pipe#top'); // ok('/docs/search.html?q=pipe')
 * strToUrlPathAndQuery.apply('http://example.org/docs');      // err('http://example.org/docs', 'URL must not be complete')
 * ```
 */
export const strToUrlPathAndQuery: Converter<Maybe<string>, string | Missing> = defineConverter(
  (value: Maybe<string>, context: ConversionContext) => {
    if (isMissing(value)) return ok(value);
    const parts = splitUrl(value);
    if (!parts) return err(value, localize(context, BASE_MESSAGES.INVALID_URL));
    if (parts.scheme || parts.authority) return err(value, localize(context, BASE_MESSAGES.URL_COMPLETE));
    return ok(joinUrl({ ...parts, fragment: "" }));
  }
);

export const inputToUrlPathAndQuery: Converter<Maybe<string>, string | Missing> = pipe(
  cleanupLine,
  strToUrlPathAndQuery
);
