/**
 * Message Module - Pure Transformations
 *
 * Classification, the two decoders, and read-only accessors over a decoded
 * message. No side effects, no I/O - just data in, data out.
 */
import type { HistoryTable } from "../history/index.js";
import { parseClassicHistory, parseEnvyHistory } from "../history/index.js";
import type { MarkupNode } from "../markup/index.js";
import {
  containsTag,
  getNode,
  getScalar,
  toFloat,
  toInteger,
  toOptionalInteger,
} from "../markup/index.js";
import type {
  ChannelIndex,
  ChannelReading,
  Channels,
  ClassicMessage,
  DeviceType,
  EnvyMessage,
  Message,
  ReadingIdentity,
  TimeOfDay,
} from "./schema.js";
import { CHANNEL_INDEXES } from "./schema.js";

const EMPTY_NODE: MarkupNode = {};

const EMPTY_HISTORY: HistoryTable = {};

const SECONDS_PER_DAY = 86400;

// =============================================================================
// Classification
// =============================================================================

/**
 * Decide which device generation produced a parsed message.
 *
 * A `src` node with a `name` child is Classic; anything else (a plain
 * string, a missing `src`, an unknown shape) is Envy.
 *
 * @example
 * classifyMessage({ src: { name: "CC02", sver: "1.06" } }) // "classic"
 * classifyMessage({ src: "CC128-v0.11" }) // "envy"
 */
export function classifyMessage(tree: MarkupNode): DeviceType {
  const src = getNode(tree, "src");
  return src?.["name"] !== undefined ? "classic" : "envy";
}

/**
 * Decode a parsed message along the path its classification selects.
 */
export function buildMessage(raw: string, tree: MarkupNode): Message {
  switch (classifyMessage(tree)) {
    case "classic":
      return decodeClassic(raw, tree);
    case "envy":
      return decodeEnvy(raw, tree);
  }
}

// =============================================================================
// Shared Field Extraction
// =============================================================================

/**
 * Integer count that is never negative; missing or non-numeric is 0.
 */
function toCount(value: string | null): number {
  return Math.max(0, toInteger(value));
}

/**
 * Read `ch1`..`ch3`. Each is a single-entry node: unit name → raw value.
 *
 * @example
 * parseChannels({ ch1: { watts: "00345" } })
 * // { 1: { unitName: "watts", rawValue: "00345" } }
 */
export function parseChannels(tree: MarkupNode): Channels {
  const channels: Partial<Record<ChannelIndex, ChannelReading>> = {};

  for (const index of CHANNEL_INDEXES) {
    const node = getNode(tree, `ch${index}`);
    const [entry] = node ? Object.entries(node) : [];
    if (!entry) continue;

    const [unitName, rawValue] = entry;
    if (typeof rawValue !== "string") continue;

    channels[index] = { unitName, rawValue };
  }

  return channels;
}

/**
 * Sum of channels 1..3; a missing or unreadable channel adds 0.
 * Null when channel 1 is absent, i.e. there is no unit to report in.
 */
export function computeTotal(channels: Channels): number | null {
  if (!channels[1]) {
    return null;
  }

  return CHANNEL_INDEXES.reduce(
    (sum, index) => sum + (toFloat(channels[index]?.rawValue ?? null) ?? 0),
    0,
  );
}

/**
 * Split an Envy `src` on its first hyphen into name and version.
 *
 * @example
 * splitDeviceString("CC128-v0.11") // ["CC128", "v0.11"]
 * splitDeviceString("CC128") // ["CC128", ""]
 */
export function splitDeviceString(src: string): readonly [string, string] {
  const hyphen = src.indexOf("-");
  if (hyphen < 0) {
    return [src, ""];
  }
  return [src.slice(0, hyphen), src.slice(hyphen + 1)];
}

/**
 * Split an `HH:MM:SS` token; missing parts are 0.
 */
export function parseTimeOfDay(time: string | null): TimeOfDay {
  const [hour, minute, second] = time === null ? [] : time.split(":", 3);
  return {
    hour: toCount(hour ?? null),
    minute: toCount(minute ?? null),
    second: toCount(second ?? null),
  };
}

// =============================================================================
// Classic
// =============================================================================

/**
 * Decode the older schema: identity under `src`, time under `date`.
 */
export function decodeClassic(raw: string, tree: MarkupNode): ClassicMessage {
  const src = getNode(tree, "src") ?? EMPTY_NODE;
  const date = getNode(tree, "date") ?? EMPTY_NODE;
  const hist = getNode(tree, "hist");
  const channels = parseChannels(tree);

  return {
    deviceType: "classic",
    raw,
    deviceName: getScalar(src, "name") ?? "",
    deviceVersion: getScalar(src, "sver") ?? "",
    deviceId: getScalar(src, "id"),
    sensorType: toOptionalInteger(getScalar(src, "type")),
    daysSinceBoot: toCount(getScalar(date, "dsb")),
    timeOfDay: {
      hour: toCount(getScalar(date, "hr")),
      minute: toCount(getScalar(date, "min")),
      second: toCount(getScalar(date, "sec")),
    },
    temperature: toFloat(getScalar(tree, "tmpr")),
    channels,
    total: computeTotal(channels),
    history: hist ? parseClassicHistory(hist) : null,
  };
}

// =============================================================================
// Envy
// =============================================================================

/**
 * Decode the newer schema: identity in one `NAME-VERSION` string, flat
 * reading fields, history read from the raw text.
 */
export function decodeEnvy(raw: string, tree: MarkupNode): EnvyMessage {
  const [deviceName, deviceVersion] = splitDeviceString(
    getScalar(tree, "src") ?? "",
  );
  const time = getScalar(tree, "time");
  const channels = parseChannels(tree);

  return {
    deviceType: "envy",
    raw,
    deviceName,
    deviceVersion,
    daysSinceBoot: toCount(getScalar(tree, "dsb")),
    time,
    timeOfDay: parseTimeOfDay(time),
    temperature: toFloat(getScalar(tree, "tmpr")),
    sensor: toOptionalInteger(getScalar(tree, "sensor")),
    readingId: getScalar(tree, "id"),
    readingType: toOptionalInteger(getScalar(tree, "type")),
    channels,
    total: computeTotal(channels),
    history: containsTag(tree, "hist") ? parseEnvyHistory(raw) : null,
  };
}

// =============================================================================
// Accessors
// =============================================================================

export function getDeviceType(message: Message): DeviceType {
  return message.deviceType;
}

/**
 * True if the message carries any live channel reading.
 */
export function hasReadings(message: Message): boolean {
  return Object.keys(message.channels).length > 0;
}

export function hasHistory(message: Message): boolean {
  return message.history !== null;
}

/**
 * Unit of channel 1, or null when there are no live readings to report.
 */
export function getUnits(message: Message): string | null {
  return message.channels[1]?.unitName ?? null;
}

/**
 * Reading value for one channel, or the total of all channels.
 *
 * @param channel - Channel to read; omit for the total
 * @returns null if the message has no readings or the channel is absent
 *
 * @example
 * getValue(message) // 2496
 * getValue(message, 1) // 345
 */
export function getValue(
  message: Message,
  channel?: ChannelIndex,
): number | null {
  if (getUnits(message) === null) {
    return null;
  }

  if (channel === undefined) {
    return message.total;
  }

  return toFloat(message.channels[channel]?.rawValue ?? null);
}

/**
 * The history table; empty when the message carries none.
 */
export function getHistory(message: Message): HistoryTable {
  return message.history ?? EMPTY_HISTORY;
}

export function getTimeInSeconds(message: Message): number {
  const { hour, minute, second } = message.timeOfDay;
  return hour * 3600 + minute * 60 + second;
}

/**
 * Seconds since the device booted: days since boot plus time of day.
 */
export function getBootTimeSeconds(message: Message): number {
  return message.daysSinceBoot * SECONDS_PER_DAY + getTimeInSeconds(message);
}

/**
 * Time of day as `HH:MM:SS`. Envy keeps the token it was sent.
 */
export function getTimeString(message: Message): string {
  if (message.deviceType === "envy" && message.time !== null) {
    return message.time;
  }

  const { hour, minute, second } = message.timeOfDay;
  return [hour, minute, second]
    .map((part) => String(part).padStart(2, "0"))
    .join(":");
}

/**
 * Sensor, id and type of the live reading.
 *
 * A Classic monitor has a single sensor (0); its id and type are the
 * device's own.
 */
export function getReadingIdentity(message: Message): ReadingIdentity {
  switch (message.deviceType) {
    case "classic":
      return {
        sensor: 0,
        id: message.deviceId,
        type: message.sensorType,
      };
    case "envy":
      return {
        sensor: message.sensor,
        id: message.readingId,
        type: message.readingType,
      };
  }
}
