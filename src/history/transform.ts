/**
 * History Module - Pure Transformations
 *
 * Two reconstructions, one per device generation:
 *
 * - Classic reads the already-parsed `hist` node.
 * - Envy reads the raw message text. Its history repeats `<data>` blocks,
 *   one per sensor, with differing inner tags; a generic tree parse folds
 *   those siblings and can lose or merge blocks, so the text is split and
 *   scanned directly instead.
 */
import type { MarkupNode } from "../markup/index.js";
import { getNode, isMarkupList, toFloat } from "../markup/index.js";
import type {
  HistoryRecord,
  HistorySeries,
  HistoryTable,
  SpanKind,
} from "./schema.js";
import {
  CLASSIC_SENSOR_INDEX,
  CLASSIC_SPAN_GROUPS,
  SPAN_KINDS,
  SPAN_PREFIXES,
} from "./schema.js";

/**
 * Span for a tag prefix letter, or null for any other letter.
 */
export function spanForPrefix(prefix: string): SpanKind | null {
  return SPAN_KINDS.find((span) => SPAN_PREFIXES[span] === prefix) ?? null;
}

/**
 * Split a history tag like `h02` into its span and age.
 *
 * @example
 * parseAgeTag("h02") // { span: "hours", age: 2 }
 * parseAgeTag("dsw") // null
 */
export function parseAgeTag(
  tag: string,
): Readonly<{ span: SpanKind; age: number }> | null {
  const [, prefix, digits] = /^([a-z])(\d+)$/.exec(tag) ?? [];
  if (!prefix || !digits) {
    return null;
  }

  const span = spanForPrefix(prefix);
  if (!span) {
    return null;
  }

  return { span, age: Number.parseInt(digits, 10) };
}

/**
 * Usage value as a number. History values are always numeric on the wire,
 * so anything unreadable counts as no usage.
 */
function toUsage(value: string): number {
  return toFloat(value) ?? 0;
}

// =============================================================================
// Classic
// =============================================================================

/**
 * Rebuild the history table from a Classic `hist` node.
 *
 * Each span group (`hrs`, `days`, `mths`, `yrs`) holds age tags directly;
 * everything belongs to the single Classic sensor.
 *
 * @example
 * parseClassicHistory({ hrs: { h02: "001.3" } })
 * // { 0: { hours: { 2: 1.3 } } }
 */
export function parseClassicHistory(hist: MarkupNode): HistoryTable {
  const spans: Partial<Record<SpanKind, Record<number, number>>> = {};

  for (const group of CLASSIC_SPAN_GROUPS) {
    const node = getNode(hist, group);
    if (!node) continue;

    for (const [tag, value] of Object.entries(node)) {
      const parsed = parseAgeTag(tag);
      if (!parsed) continue;

      // Repeated tags come back as a list; the last one wins
      const scalar = isMarkupList(value) ? value[value.length - 1] : value;
      if (typeof scalar !== "string") continue;

      const series: Record<number, number> = spans[parsed.span] ?? {};
      series[parsed.age] = toUsage(scalar);
      spans[parsed.span] = series;
    }
  }

  return { [CLASSIC_SENSOR_INDEX]: spans };
}

// =============================================================================
// Envy (operates on source text, not the decoded tree)
// =============================================================================

const HIST_OPEN = /<hist(?=[\s>/])[^>]*>/;
const DATA_BOUNDARY = /<\/data>\s*<data>/;
const SENSOR_TAG = /<sensor>(\d+)</;

/**
 * Split raw message text into one chunk per `<data>` block.
 *
 * Only the text from the `<hist>` opening tag onwards is considered (with or
 * without attributes), so a live reading's own `<sensor>` before the history
 * is never picked up. A self-closing `<hist/>` or a message without a history
 * element has no blocks. The first chunk still carries the history header,
 * the last one the closing tags.
 */
export function splitDataBlocks(raw: string): ReadonlyArray<string> {
  const open = HIST_OPEN.exec(raw);
  if (!open || open[0].endsWith("/>")) {
    return [];
  }

  return raw.slice(open.index).split(DATA_BOUNDARY);
}

/**
 * Collect every `<X<digits>>value</X<digits>>` tag for one span letter.
 * Returns null when the block has none, so the span stays absent.
 */
export function scanSpan(block: string, span: SpanKind): HistorySeries | null {
  const prefix = SPAN_PREFIXES[span];
  const pattern = new RegExp(`<${prefix}(\\d+)>([^<]+)</${prefix}\\1>`, "g");
  const series: Record<number, number> = {};
  let found = false;

  for (const match of block.matchAll(pattern)) {
    const [, age, value] = match;
    if (age === undefined || value === undefined) continue;

    series[Number.parseInt(age, 10)] = toUsage(value);
    found = true;
  }

  return found ? series : null;
}

/**
 * Build one sensor's record from a single `<data>` chunk.
 */
export function parseHistoryBlock(block: string): HistoryRecord {
  const record: Partial<Record<SpanKind, HistorySeries>> = {};

  for (const span of SPAN_KINDS) {
    const series = scanSpan(block, span);
    if (series) {
      record[span] = series;
    }
  }

  return record;
}

/**
 * Rebuild the history table from raw Envy message text.
 *
 * Chunks without a `<sensor>N</sensor>` index are skipped.
 *
 * @example
 * parseEnvyHistory("<hist><data><sensor>1</sensor><h004>0.5</h004></data></hist>")
 * // { 1: { hours: { 4: 0.5 } } }
 */
export function parseEnvyHistory(raw: string): HistoryTable {
  const table: Record<number, HistoryRecord> = {};

  for (const block of splitDataBlocks(raw)) {
    const sensor = SENSOR_TAG.exec(block)?.[1];
    if (sensor === undefined) continue;

    table[Number.parseInt(sensor, 10)] = parseHistoryBlock(block);
  }

  return table;
}

// =============================================================================
// Ordering (for display)
// =============================================================================

/**
 * Numeric keys of a table or series in ascending order.
 */
export function sortedKeys(entries: Readonly<Record<number, unknown>>): number[] {
  return Object.keys(entries)
    .map((key) => Number(key))
    .sort((a, b) => a - b);
}
