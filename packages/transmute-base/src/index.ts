/**
 * transmute-base
 *
 * Standard leaf converters for transmute: text cleanup, numbers, booleans,
 * emails, URLs, slugs, validators and collection helpers. Every converter
 * returns missing values untouched unless documented otherwise.
 *
 * ```typescript
 * import { pipe, required, struct } from 'transmute';
 * import { cleanupLine, inputToInt, strToEmail } from 'transmute-base';
 *
 * const signup = struct({
 *   username: pipe(cleanupLine, required()),
 *   age: inputToInt,
 *   email: strToEmail,
 * });
 * ```
 */

export { BASE_MESSAGES, type BaseMessageKey } from "./messages";

// =============================================================================
// Text & Strings
// =============================================================================

export { isEmpty, emptyToNull, cleanupLine, cleanupText, strip, split, anythingToString } from "./text";

export {
  type CaseTransform,
  type SimplifyOptions,
  lower,
  upper,
  normalize,
  slugify,
  makeInputToNormalForm,
  makeInputToSlug,
  inputToSlug,
  makeInputToUrlName,
  inputToUrlName,
} from "./strings";

// =============================================================================
// Scalars
// =============================================================================

export { parseNumber, anythingToInt, anythingToFloat, inputToInt, inputToFloat } from "./numbers";

export { anythingToBool, boolToString, strToBool, inputToBool, guessBool } from "./booleans";

export { strToEmail, inputToEmail } from "./email";

export {
  type UrlParts,
  type UrlOptions,
  splitUrl,
  joinUrl,
  makeStrToUrl,
  makeInputToUrl,
  strToUrlPathAndQuery,
  inputToUrlPathAndQuery,
} from "./url";

// =============================================================================
// Validators
// =============================================================================

export {
  type Candidates,
  type Comparable,
  testBetween,
  testEquals,
  testGreaterOrEqual,
  testLessOrEqual,
  testIs,
  testIn,
  testNotIn,
  testInstanceOf,
  testMatch,
  testIsString,
  testIsNumber,
  testIsArray,
  testIsRecord,
  testNone,
  testNotNone,
  notNone,
} from "./tests";

// =============================================================================
// Collections
// =============================================================================

export {
  type GetOptions,
  type ItemOrSequenceOptions,
  type NewMappingOptions,
  type NewSequenceOptions,
  get,
  renameItem,
  extractWhenSingleton,
  itemToSingleton,
  itemOrSequence,
  newMapping,
  newSequence,
} from "./collections";
