/**
 * transmute
 *
 * Composable converters: small units that turn input into a value and an
 * optional error, combined into larger converters without losing track of
 * where each error came from.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { check, pipe, required, struct, test, transform } from 'transmute';
 *
 * const trim = transform((value: string) => value.trim() || null);
 * const signup = struct({
 *   username: pipe(trim, required()),
 *   age: pipe(transform(Number), test((age: number) => age >= 18, { message: 'Too young' })),
 * });
 *
 * signup.apply({ username: '  Ada ', age: '36' });
 * // { ok: true, value: { username: 'Ada', age: 36 }, error: null }
 *
 * signup.apply({ age: '12' });
 * // { ok: false, value: { username: null, age: 12 }, error: { username: 'Missing value', age: 'Too young' } }
 *
 * const user = check(signup)(form); // value, or throws ConversionCheckError
 * ```
 *
 * ## Entry Points
 *
 * - `transmute` - converters, combinators, context and errors
 * - `transmute/testing` - probes and assertions for tests
 */

// =============================================================================
// Result & Error Model
// =============================================================================

export {
  type Missing,
  type Maybe,
  type ErrorTree,
  type ConversionError,
  type Converted,
  type Failed,
  type Conversion,
  ok,
  err,
  isOk,
  isErr,
  isMissing,
  isErrorTree,
  isConversion,
  toPair,
  flattenErrors,
  formatError,
} from "./result";

// =============================================================================
// Context & Contract
// =============================================================================

export {
  type Translator,
  type MessageParams,
  type ConversionContext,
  type ContextOptions,
  createContext,
  defaultContext,
  catalogTranslator,
  formatMessage,
  localize,
} from "./context";

export {
  type Converter,
  type ConvertFn,
  type AnyConverter,
  type InputOf,
  type OutputOf,
  defineConverter,
  isConverter,
} from "./converter";

export { MESSAGES, type MessageKey } from "./messages";

// =============================================================================
// Leaf Adapters
// =============================================================================

export {
  type Message,
  type LeafOptions,
  type TestOptions,
  type TranslationTable,
  type Recover,
  resolveMessage,
  transform,
  test,
  defaultTo,
  fail,
  noop,
  setValue,
  translate,
  catchError,
  testConverter,
  required,
} from "./leaves";

// =============================================================================
// Combinators
// =============================================================================

export { pipe } from "./pipe";

export {
  type UnexpectedPolicy,
  type Schema,
  type StructOutput,
  type TupleOutput,
  type StructOptions,
  type TupleOptions,
  struct,
  tuple,
  merge,
  submapping,
} from "./struct";

export { type Mapping, isMapping } from "./records";

export {
  type UniformMappingOptions,
  type UniformSequenceOptions,
  type SequenceKind,
  type SequenceInput,
  uniformMapping,
  uniformSequence,
} from "./uniform";

export {
  type BranchTable,
  type SwitchOptions,
  condition,
  firstMatch,
  switchOn,
} from "./control";

// =============================================================================
// Extraction & Errors
// =============================================================================

export { type CheckOptions, check, passes } from "./check";

export {
  type TransmuteError,
  ConversionCheckError,
  ShapeError,
  isConversionCheckError,
  isShapeError,
  isTransmuteError,
  describeType,
  describeValue,
} from "./errors";

// =============================================================================
// Events
// =============================================================================

export {
  type ConversionEvent,
  type ConversionEventType,
  traced,
  formatEvent,
} from "./events";
