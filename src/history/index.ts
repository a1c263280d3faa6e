/**
 * History Module - Public API
 */

// Types
export type {
  HistoryRecord,
  HistorySeries,
  HistoryTable,
  SpanKind,
} from "./schema.js";

export { SPAN_KINDS } from "./schema.js";

// Pure transformations
export {
  parseAgeTag,
  parseClassicHistory,
  parseEnvyHistory,
  parseHistoryBlock,
  scanSpan,
  sortedKeys,
  splitDataBlocks,
  spanForPrefix,
} from "./transform.js";
