/**
 * Message Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  ChannelIndex,
  ChannelReading,
  Channels,
  ClassicMessage,
  DecodeOptions,
  DeviceType,
  EnvyMessage,
  Message,
  ReadingIdentity,
  TimeOfDay,
} from "./schema.js";
export type { MessageError } from "./errors.js";

export { CHANNEL_INDEXES } from "./schema.js";

// Error utilities
export { MalformedMessageError, formatMessageError } from "./errors.js";

// Service functions
export {
  decodeMessage,
  decodeMessageOrThrow,
  decodeMessages,
} from "./service.js";

// Pure transformations
export {
  buildMessage,
  classifyMessage,
  computeTotal,
  decodeClassic,
  decodeEnvy,
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
  parseChannels,
  parseTimeOfDay,
  splitDeviceString,
} from "./transform.js";
