/**
 * Summary Module - Pure Transformations
 *
 * Human-readable report of a decoded message. The output is deterministic:
 * sensors and ages in ascending numeric order, spans by name.
 */
import { SPAN_KINDS, sortedKeys } from "../history/index.js";
import type { Message } from "../message/index.js";
import {
  CHANNEL_INDEXES,
  getHistory,
  getReadingIdentity,
  getUnits,
  getValue,
  hasHistory,
} from "../message/index.js";

const INDENT = "  ";

const EXPONENT_FORM = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Render a number as plain decimal, without the padding it was sent with
 * and never in exponent form.
 *
 * @example
 * formatNumber(Number.parseFloat("00345")) // "345"
 * formatNumber(Number.parseFloat("001.30")) // "1.3"
 * formatNumber(1e-7) // "0.0000001"
 */
export function formatNumber(value: number): string {
  if (Object.is(value, -0)) {
    return "0";
  }

  const text = String(value);
  const [, sign = "", whole = "", fraction = "", exponent = "0"] =
    EXPONENT_FORM.exec(text) ?? [];
  if (whole === "") {
    return text;
  }

  // Shift the decimal point through the significant digits
  const digits = whole + fraction;
  const point = whole.length + Number.parseInt(exponent, 10);

  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${"0".repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function formatOptional(value: string | number | null): string {
  return value === null ? "" : String(value);
}

/**
 * Lines describing the live readings, or none if there is no unit to
 * report in. Channels without a value are skipped, not shown as 0.
 */
export function formatReadingLines(message: Message, prefix: string): string[] {
  const units = getUnits(message);
  const total = getValue(message);
  if (units === null || total === null) {
    return [];
  }

  const { sensor, id, type } = getReadingIdentity(message);
  const lines = [
    `${prefix}Sensor: ${formatOptional(sensor)} [${formatOptional(id)},${formatOptional(type)}]`,
    `${prefix}Total: ${formatNumber(total)} ${units}`,
  ];

  for (const phase of CHANNEL_INDEXES) {
    const value = getValue(message, phase);
    if (value === null) continue;
    lines.push(`${prefix}Phase ${phase}: ${formatNumber(value)} ${units}`);
  }

  return lines;
}

/**
 * Lines listing the history table, or none if the message has no history.
 */
export function formatHistoryLines(message: Message, prefix: string): string[] {
  if (!hasHistory(message)) {
    return [];
  }

  const history = getHistory(message);
  const lines = [`${prefix}History`];

  for (const sensor of sortedKeys(history)) {
    const record = history[sensor];
    if (!record) continue;

    lines.push(`${prefix}${INDENT}Sensor ${sensor}`);

    // SPAN_KINDS is in lexicographic order
    for (const span of SPAN_KINDS) {
      const series = record[span];
      if (!series) continue;

      for (const age of sortedKeys(series)) {
        const usage = series[age];
        if (usage === undefined) continue;
        lines.push(
          `${prefix}${INDENT}${INDENT}-${age} ${span}: ${formatNumber(usage)}`,
        );
      }
    }
  }

  return lines;
}

/**
 * Multi-line report of a message, every line starting with `prefix` and
 * ending in a newline.
 *
 * @example
 * summarizeMessage(message)
 * // "Device: CC128 v0.11\n  Sensor: 1 [01234,1]\n  Total: 2496 watts\n..."
 */
export function summarizeMessage(message: Message, prefix = ""): string {
  const inner = `${prefix}${INDENT}`;
  const lines = [
    `${prefix}Device: ${message.deviceName} ${message.deviceVersion}`,
    ...formatReadingLines(message, inner),
    ...formatHistoryLines(message, inner),
  ];

  return lines.map((line) => `${line}\n`).join("");
}
