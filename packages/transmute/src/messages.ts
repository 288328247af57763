/**
 * Message keys used by the core converters.
 *
 * These are the untranslated texts handed to `context.translate`, so a catalog
 * keyed by them localizes every built-in error.
 */
export const MESSAGES = {
  TEST_FAILED: "Test failed",
  ERROR_OCCURRED: "An error occurred",
  MISSING_VALUE: "Missing value",
  UNEXPECTED_ITEM: "Unexpected item",
  NO_MATCHING_BRANCH: 'Expression "{key}" doesn\'t match any key',
} as const;

export type MessageKey = keyof typeof MESSAGES;
