/**
 * Message Module - Schemas and Types
 *
 * The decoded message: a closed union over the two device generations.
 * Every field is decided at decode time; a message never changes after.
 */
import type { Logger } from "pino";

import type { HistoryTable } from "../history/index.js";

// =============================================================================
// Device Generation
// =============================================================================

/**
 * Which schema produced the message.
 * - classic: older monitors, `src` is a node with `name`/`id`/`type`/`sver`
 * - envy: newer monitors, `src` is a `NAME-VERSION` string
 */
export type DeviceType = "classic" | "envy";

// =============================================================================
// Readings
// =============================================================================

/**
 * Channel (phase) numbers a live reading can carry.
 */
export type ChannelIndex = 1 | 2 | 3;

export const CHANNEL_INDEXES: ReadonlyArray<ChannelIndex> = [1, 2, 3] as const;

/**
 * One live reading line, e.g. `<ch1><watts>00345</watts></ch1>`.
 * The raw value is kept exactly as sent.
 */
export type ChannelReading = Readonly<{
  unitName: string;
  rawValue: string;
}>;

/**
 * Live readings by channel. Empty for history-only messages.
 *
 * Channels are assumed to share channel 1's unit; this is not checked.
 */
export type Channels = Readonly<Partial<Record<ChannelIndex, ChannelReading>>>;

export type TimeOfDay = Readonly<{
  hour: number;
  minute: number;
  second: number;
}>;

// =============================================================================
// Message
// =============================================================================

type MessageFields = Readonly<{
  /** Undecoded message text */
  raw: string;
  deviceName: string;
  deviceVersion: string;
  daysSinceBoot: number;
  timeOfDay: TimeOfDay;
  temperature: number | null;
  channels: Channels;
  /** Sum of channels 1..3, or null when there are no readings */
  total: number | null;
  /** Null when the message carries no history */
  history: HistoryTable | null;
}>;

export type ClassicMessage = MessageFields &
  Readonly<{
    deviceType: "classic";
    deviceId: string | null;
    sensorType: number | null;
  }>;

export type EnvyMessage = MessageFields &
  Readonly<{
    deviceType: "envy";
    /** `HH:MM:SS` as sent, or null if absent */
    time: string | null;
    sensor: number | null;
    readingId: string | null;
    readingType: number | null;
  }>;

export type Message = ClassicMessage | EnvyMessage;

/**
 * Sensor, id and type of a live reading, as shown in summaries.
 */
export type ReadingIdentity = Readonly<{
  sensor: number | null;
  id: string | null;
  type: number | null;
}>;

// =============================================================================
// Decoding Options
// =============================================================================

export type DecodeOptions = Readonly<{
  /** Where decoding diagnostics go; defaults to the `message` logger */
  logger?: Logger;
}>;
