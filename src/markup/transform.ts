/**
 * Markup Module - Pure Transformations
 *
 * Wraps fast-xml-parser: validates the text, parses it into the generic
 * tree, and offers typed lookups over the result. Field lookups never fail;
 * an absent or wrongly shaped field is `null`.
 */
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { type Result, err, ok } from "neverthrow";

import { type MarkupError, malformedMarkup } from "./errors.js";
import type { MarkupDocument, MarkupNode, MarkupValue } from "./schema.js";
import { MarkupNodeSchema } from "./schema.js";

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  // Keep "00345" as written; coercion happens field by field
  parseTagValue: false,
  trimValues: true,
});

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse markup text into its root tag and generic tree.
 *
 * @param text - Raw markup, e.g. `<msg>...</msg>`
 * @returns The document, or MALFORMED_MARKUP if the text is not well formed
 *
 * @example
 * parseMarkup("<msg><src>CC128-v0.11</src></msg>")
 * // ok({ root: "msg", tree: { src: "CC128-v0.11" } })
 */
export function parseMarkup(text: string): Result<MarkupDocument, MarkupError> {
  if (text.trim() === "") {
    return err(malformedMarkup("Empty input"));
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    return err(
      malformedMarkup(validation.err.msg, {
        line: validation.err.line,
        column: validation.err.col,
      }),
    );
  }

  let output: unknown;
  try {
    output = parser.parse(text);
  } catch (error) {
    return err(
      malformedMarkup(error instanceof Error ? error.message : String(error)),
    );
  }

  const parsed = MarkupNodeSchema.safeParse(output);
  if (!parsed.success) {
    return err(malformedMarkup("Unexpected parser output"));
  }

  const roots = Object.entries(parsed.data);
  const first = roots[0];
  if (roots.length !== 1 || first === undefined) {
    return err(malformedMarkup(`Expected one root element, found ${roots.length}`));
  }

  const [root, content] = first;
  if (isMarkupList(content)) {
    return err(malformedMarkup(`Expected one root element, found ${content.length}`));
  }

  return ok({ root, tree: isMarkupNode(content) ? content : {} });
}

// =============================================================================
// Tree Lookups
// =============================================================================

/**
 * True if the value is a list of repeated siblings.
 */
export function isMarkupList(
  value: MarkupValue,
): value is ReadonlyArray<MarkupValue> {
  return Array.isArray(value);
}

/**
 * True if the value is a nested node (not a scalar, not a list).
 */
export function isMarkupNode(value: MarkupValue): value is MarkupNode {
  return typeof value !== "string" && !isMarkupList(value);
}

/**
 * Scalar text of a child tag, or null if absent or not a scalar.
 */
export function getScalar(node: MarkupNode, tag: string): string | null {
  const value = node[tag];
  return typeof value === "string" ? value : null;
}

/**
 * Nested node under a child tag, or null if absent or not a node.
 */
export function getNode(node: MarkupNode, tag: string): MarkupNode | null {
  const value = node[tag];
  return value !== undefined && isMarkupNode(value) ? value : null;
}

/**
 * True if the tag occurs anywhere in the tree, at any depth.
 */
export function containsTag(value: MarkupValue, tag: string): boolean {
  if (typeof value === "string") {
    return false;
  }

  if (isMarkupList(value)) {
    return value.some((item) => containsTag(item, tag));
  }

  return Object.entries(value).some(
    ([key, child]) => key === tag || containsTag(child, tag),
  );
}

// =============================================================================
// Numeric Coercion
// =============================================================================

/**
 * Coerce scalar text to an integer; non-numeric or missing becomes 0.
 *
 * @example
 * toInteger("00089") // 89
 * toInteger(null) // 0
 */
export function toInteger(value: string | null): number {
  if (value === null) {
    return 0;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Coerce scalar text to an integer, keeping absence: missing stays null,
 * present but non-numeric becomes 0.
 */
export function toOptionalInteger(value: string | null): number | null {
  return value === null ? null : toInteger(value);
}

/**
 * Coerce scalar text to a float; non-numeric or missing becomes null.
 *
 * @example
 * toFloat("001.3") // 1.3
 * toFloat("n/a") // null
 */
export function toFloat(value: string | null): number | null {
  if (value === null) {
    return null;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? null : parsed;
}
