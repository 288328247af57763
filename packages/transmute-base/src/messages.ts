/**
 * Message keys used by the base converters, handed untranslated to
 * `context.translate`. Placeholders in braces are filled after translation.
 */
export const BASE_MESSAGES = {
  NOT_AN_INTEGER: "Value must be an integer",
  NOT_A_FLOAT: "Value must be a float",
  NOT_A_BOOLEAN: "Value must be a boolean",

  EMAIL_WITHOUT_AT: 'An email must contain exactly one "@"',
  INVALID_USERNAME: "Invalid username",
  INVALID_DOMAIN: "Invalid domain name",

  INVALID_URL: "Invalid URL",
  URL_NOT_COMPLETE: "URL must be complete",
  URL_COMPLETE: "URL must not be complete",
  URL_BAD_SCHEME: "Scheme must belong to {schemes}",
  URL_WITH_PATH: "URL must not contain a path",
  URL_WITH_QUERY: "URL must not contain a query",
  URL_WITH_FRAGMENT: "URL must not contain a fragment",

  NOT_BETWEEN: "Value must be between {min} and {max}",
  NOT_EQUAL: "Value must be equal to {constant}",
  NOT_GREATER_OR_EQUAL: "Value must be greater than or equal to {constant}",
  NOT_LESS_OR_EQUAL: "Value must be less than or equal to {constant}",
  NOT_IN: "Value must belong to {values}",
  IN: "Value must not belong to {values}",
  NOT_IDENTICAL: "Value must be {constant}",
  NOT_INSTANCE: "Value is not an instance of {type}",
  NO_MATCH: "Value must match {pattern}",
  UNEXPECTED_VALUE: "Unexpected value",
  NOT_A_STRING: "Value must be a string",
  NOT_A_NUMBER: "Value must be a number",
  NOT_AN_ARRAY: "Value must be an array",
  NOT_A_RECORD: "Value must be a record",

  UNKNOWN_KEY: "Unknown key: {key}",
  INDEX_OUT_OF_RANGE: "Index out of range: {index}",
} as const;

export type BaseMessageKey = keyof typeof BASE_MESSAGES;
