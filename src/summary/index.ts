/**
 * Summary Module - Public API
 */
export {
  formatHistoryLines,
  formatNumber,
  formatReadingLines,
  summarizeMessage,
} from "./transform.js";
