/**
 * Current Cost message decoder - package entry point.
 *
 * Decodes the markup fragments Classic and Envy energy monitors send over
 * their serial link into one typed model:
 * - live readings (up to three channels)
 * - historical usage (sensor → span → age → value)
 * - a human-readable summary
 *
 * @example
 * import { decodeMessage, summarizeMessage } from "currentcost-messages";
 *
 * const result = decodeMessage(line);
 * if (result.isOk()) process.stdout.write(summarizeMessage(result.value));
 */

// Message decoding
export type {
  ChannelIndex,
  ChannelReading,
  Channels,
  ClassicMessage,
  DecodeOptions,
  DeviceType,
  EnvyMessage,
  Message,
  MessageError,
  ReadingIdentity,
  TimeOfDay,
} from "./message/index.js";
export {
  MalformedMessageError,
  decodeMessage,
  decodeMessageOrThrow,
  decodeMessages,
  formatMessageError,
  getBootTimeSeconds,
  getDeviceType,
  getHistory,
  getReadingIdentity,
  getTimeInSeconds,
  getTimeString,
  getUnits,
  getValue,
  hasHistory,
  hasReadings,
} from "./message/index.js";

// History
export type {
  HistoryRecord,
  HistorySeries,
  HistoryTable,
  SpanKind,
} from "./history/index.js";
export { SPAN_KINDS } from "./history/index.js";

// Summary
export { formatNumber, summarizeMessage } from "./summary/index.js";
