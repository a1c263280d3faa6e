/**
 * Message Module - Error Types
 *
 * Only markup that cannot be parsed at all is an error. Missing fields are
 * null on the decoded message, never errors.
 */
import { type MarkupError, formatMarkupError } from "../markup/index.js";

/**
 * Errors that can occur while decoding a message.
 */
export type MessageError = {
  readonly type: "MALFORMED_MESSAGE";
  readonly message: string;
  readonly cause: MarkupError;
};

/**
 * Create a MALFORMED_MESSAGE error from the underlying markup failure.
 */
export function malformedMessage(cause: MarkupError): MessageError {
  return {
    type: "MALFORMED_MESSAGE",
    message: formatMarkupError(cause),
    cause,
  };
}

/**
 * Format a MessageError for logging.
 */
export function formatMessageError(error: MessageError): string {
  switch (error.type) {
    case "MALFORMED_MESSAGE":
      return `Message could not be decoded: ${error.message}`;
  }
}

/**
 * Thrown by `decodeMessageOrThrow` for callers that prefer exceptions.
 */
export class MalformedMessageError extends Error {
  readonly error: MessageError;

  constructor(error: MessageError) {
    super(formatMessageError(error));
    this.name = "MalformedMessageError";
    this.error = error;
  }
}
