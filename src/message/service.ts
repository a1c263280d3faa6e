/**
 * Message Module - Service Layer
 *
 * Entry point for decoding raw message text. Parsing is all-or-nothing;
 * everything after a successful parse is best-effort, field by field.
 * Diagnostics go to the logger passed in, never to global state.
 */
import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import { createLogger, logOperationFailed } from "../logger.js";
import { parseMarkup } from "../markup/index.js";
import type { MessageError } from "./errors.js";
import {
  MalformedMessageError,
  formatMessageError,
  malformedMessage,
} from "./errors.js";
import type { DecodeOptions, Message } from "./schema.js";
import { buildMessage } from "./transform.js";

let defaultLogger: Logger | undefined;

/**
 * The `message` module logger, built the first time a caller decodes
 * without passing one.
 */
function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger("message");
  return defaultLogger;
}

const MESSAGE_ROOT = "msg";

/**
 * Decode one raw message fragment.
 *
 * @param raw - Text of the form `<msg>...</msg>`
 * @param options - Optional logger for decoding diagnostics
 * @returns The decoded message, or MALFORMED_MESSAGE if the markup is broken
 *
 * @example
 * const result = decodeMessage("<msg><src>CC128-v0.11</src>...</msg>");
 * if (result.isOk()) console.log(result.value.deviceName); // "CC128"
 */
export function decodeMessage(
  raw: string,
  options: DecodeOptions = {},
): Result<Message, MessageError> {
  const logger = options.logger ?? getDefaultLogger();

  const document = parseMarkup(raw);
  if (document.isErr()) {
    const error = malformedMessage(document.error);
    logOperationFailed(logger, "decodeMessage", formatMessageError(error), {
      length: raw.length,
    });
    return err(error);
  }

  const { root, tree } = document.value;
  if (root !== MESSAGE_ROOT) {
    logger.debug({ root }, `Unexpected root element, expected <${MESSAGE_ROOT}>`);
  }

  const message = buildMessage(raw, tree);

  logger.debug(
    {
      deviceType: message.deviceType,
      device: message.deviceName,
      channels: Object.keys(message.channels).length,
      historySensors: message.history
        ? Object.keys(message.history).length
        : null,
    },
    "Message decoded",
  );

  return ok(message);
}

/**
 * Decode a batch of fragments, one Result per input, in order.
 * A malformed fragment does not stop the rest.
 */
export function decodeMessages(
  raws: Iterable<string>,
  options: DecodeOptions = {},
): Array<Result<Message, MessageError>> {
  return Array.from(raws, (raw) => decodeMessage(raw, options));
}

/**
 * Decode one fragment, throwing MalformedMessageError on broken markup.
 */
export function decodeMessageOrThrow(
  raw: string,
  options: DecodeOptions = {},
): Message {
  const result = decodeMessage(raw, options);
  if (result.isErr()) {
    throw new MalformedMessageError(result.error);
  }
  return result.value;
}
