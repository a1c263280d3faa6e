/**
 * Markup Module - Error Types
 *
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while parsing message markup.
 */
export type MarkupError = {
  readonly type: "MALFORMED_MARKUP";
  readonly message: string;
  readonly line?: number;
  readonly column?: number;
};

/**
 * Create a MALFORMED_MARKUP error, with the validator's location if known.
 */
export function malformedMarkup(
  message: string,
  location?: Readonly<{ line: number; column: number }>,
): MarkupError {
  if (location) {
    return {
      type: "MALFORMED_MARKUP",
      message,
      line: location.line,
      column: location.column,
    };
  }
  return { type: "MALFORMED_MARKUP", message };
}

/**
 * Format a MarkupError for logging.
 */
export function formatMarkupError(error: MarkupError): string {
  if (error.line !== undefined && error.column !== undefined) {
    return `Malformed markup at ${error.line}:${error.column}: ${error.message}`;
  }
  return `Malformed markup: ${error.message}`;
}
