/**
 * History Module - Schemas and Types
 *
 * The historical-usage table: sensor index → span → age → usage.
 */

// =============================================================================
// Spans
// =============================================================================

/**
 * Bucketing unit of a history rollup.
 */
export type SpanKind = "hours" | "days" | "months" | "years";

/**
 * All span kinds, in lexicographic order (the order they are reported in).
 */
export const SPAN_KINDS: ReadonlyArray<SpanKind> = [
  "days",
  "hours",
  "months",
  "years",
] as const;

/**
 * Tag prefix letter for each span: `h02` is hours, age 2.
 */
export const SPAN_PREFIXES: Readonly<Record<SpanKind, string>> = {
  hours: "h",
  days: "d",
  months: "m",
  years: "y",
};

/**
 * Classic monitors group their history tags under one element per span.
 */
export const CLASSIC_SPAN_GROUPS: ReadonlyArray<string> = [
  "hrs",
  "days",
  "mths",
  "yrs",
] as const;

// =============================================================================
// History Table
// =============================================================================

/**
 * Usage per age ("periods ago") for one span.
 */
export type HistorySeries = Readonly<Record<number, number>>;

/**
 * One sensor's history. A span with no readings is absent, never empty.
 */
export type HistoryRecord = Readonly<Partial<Record<SpanKind, HistorySeries>>>;

/**
 * History for every sensor in a message, keyed by sensor index.
 */
export type HistoryTable = Readonly<Record<number, HistoryRecord>>;

/**
 * Classic monitors report a single sensor.
 */
export const CLASSIC_SENSOR_INDEX = 0;
