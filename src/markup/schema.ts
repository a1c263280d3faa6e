/**
 * Markup Module - Schemas and Types
 *
 * The generic tree produced from a message's markup. A node maps tag names
 * to child values; a child is a scalar string, a nested node, or - only when
 * the same tag repeats as a sibling - a list. A single occurrence is never
 * promoted to a list of one.
 */
import { z } from "zod";

// =============================================================================
// Markup Tree
// =============================================================================

export type MarkupValue = string | MarkupNode | ReadonlyArray<MarkupValue>;

export type MarkupNode = { readonly [tag: string]: MarkupValue };

/**
 * Recursive schema for parser output. Arrays are checked before records
 * because a record schema rejects arrays.
 */
export const MarkupValueSchema: z.ZodType<MarkupValue> = z.lazy(() =>
  z.union([z.string(), z.array(MarkupValueSchema), z.record(MarkupValueSchema)]),
);

export const MarkupNodeSchema: z.ZodType<MarkupNode> =
  z.record(MarkupValueSchema);

/**
 * The parsed document: the single root element's tag and its content.
 * Content that is not a node (e.g. `<msg>text</msg>`) becomes an empty node.
 */
export type MarkupDocument = Readonly<{
  root: string;
  tree: MarkupNode;
}>;
