/**
 * Markup Module - Public API
 *
 * Adapter between raw message text and the generic tree the decoders read.
 */

// Types
export type {
  MarkupDocument,
  MarkupNode,
  MarkupValue,
} from "./schema.js";
export type { MarkupError } from "./errors.js";

// Error utilities
export { formatMarkupError } from "./errors.js";

// Pure transformations
export {
  containsTag,
  getNode,
  getScalar,
  isMarkupList,
  isMarkupNode,
  parseMarkup,
  toFloat,
  toInteger,
  toOptionalInteger,
} from "./transform.js";
