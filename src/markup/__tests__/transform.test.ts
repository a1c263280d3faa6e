/**
 * Markup Transform Tests
 *
 * Parsing raw markup into the generic tree, and lookups over it.
 */
import { describe, expect, it } from "vitest";

import type { MarkupNode } from "../schema.js";
import {
  containsTag,
  getNode,
  getScalar,
  isMarkupList,
  isMarkupNode,
  parseMarkup,
  toFloat,
  toInteger,
  toOptionalInteger,
} from "../transform.js";

describe("Markup Transform", () => {
  // ===========================================================================
  // Parsing
  // ===========================================================================

  describe("parseMarkup", () => {
    it("returns the root tag and its children", () => {
      const result = parseMarkup("<msg><src>CC128-v0.11</src></msg>");

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          root: "msg",
          tree: { src: "CC128-v0.11" },
        });
      }
    });

    it("keeps scalar text exactly as written", () => {
      const result = parseMarkup("<msg><dsb>00089</dsb><tmpr>18.70</tmpr></msg>");

      expect(result._unsafeUnwrap().tree).toEqual({
        dsb: "00089",
        tmpr: "18.70",
      });
    });

    it("nests child elements as nodes", () => {
      const result = parseMarkup(
        "<msg><ch1><watts>00345</watts></ch1></msg>",
      );

      expect(result._unsafeUnwrap().tree).toEqual({
        ch1: { watts: "00345" },
      });
    });

    it("turns repeated siblings into a list", () => {
      const result = parseMarkup(
        "<msg><data><sensor>0</sensor></data><data><sensor>1</sensor></data></msg>",
      );

      expect(result._unsafeUnwrap().tree).toEqual({
        data: [{ sensor: "0" }, { sensor: "1" }],
      });
    });

    it("does not wrap a single occurrence in a list", () => {
      const result = parseMarkup("<msg><data><sensor>0</sensor></data></msg>");

      expect(result._unsafeUnwrap().tree).toEqual({
        data: { sensor: "0" },
      });
    });

    it("reads an empty element as an empty string", () => {
      const result = parseMarkup("<msg><hist></hist></msg>");

      expect(result._unsafeUnwrap().tree).toEqual({ hist: "" });
    });

    it("gives an empty tree when the root holds only text", () => {
      const result = parseMarkup("<msg>hello</msg>");

      expect(result._unsafeUnwrap()).toEqual({ root: "msg", tree: {} });
    });

    it("accepts a root other than msg", () => {
      const result = parseMarkup("<reading><dsb>1</dsb></reading>");

      expect(result._unsafeUnwrap().root).toBe("reading");
    });

    it("rejects empty input", () => {
      const result = parseMarkup("   ");

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          type: "MALFORMED_MARKUP",
          message: "Empty input",
        });
      }
    });

    it("rejects an unclosed element", () => {
      const result = parseMarkup("<msg><src>CC128-v0.11</msg>");

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe("MALFORMED_MARKUP");
        expect(result.error.line).toBe(1);
      }
    });

    it("rejects plain text", () => {
      const result = parseMarkup("not a message");

      expect(result.isErr()).toBe(true);
    });

    it("rejects more than one root element", () => {
      const result = parseMarkup("<msg><dsb>1</dsb></msg><msg><dsb>2</dsb></msg>");

      expect(result.isErr()).toBe(true);
    });
  });

  // ===========================================================================
  // Lookups
  // ===========================================================================

  describe("lookups", () => {
    const tree: MarkupNode = {
      src: { name: "CC02", sver: "1.06" },
      dsb: "00001",
      data: [{ sensor: "0" }, { sensor: "1" }],
    };

    it("getScalar returns scalar text only", () => {
      expect(getScalar(tree, "dsb")).toBe("00001");
      expect(getScalar(tree, "src")).toBeNull();
      expect(getScalar(tree, "data")).toBeNull();
      expect(getScalar(tree, "missing")).toBeNull();
    });

    it("getNode returns nested nodes only", () => {
      expect(getNode(tree, "src")).toEqual({ name: "CC02", sver: "1.06" });
      expect(getNode(tree, "dsb")).toBeNull();
      expect(getNode(tree, "data")).toBeNull();
      expect(getNode(tree, "missing")).toBeNull();
    });

    it("distinguishes lists from nodes", () => {
      expect(isMarkupList(tree)).toBe(false);
      expect(isMarkupNode(tree)).toBe(true);
      expect(isMarkupList([tree])).toBe(true);
      expect(isMarkupNode([tree])).toBe(false);
      expect(isMarkupNode("text")).toBe(false);
    });

    it("containsTag searches every depth, including lists", () => {
      expect(containsTag(tree, "dsb")).toBe(true);
      expect(containsTag(tree, "sver")).toBe(true);
      expect(containsTag(tree, "sensor")).toBe(true);
      expect(containsTag(tree, "hist")).toBe(false);
    });

    it("containsTag does not match scalar text", () => {
      expect(containsTag({ note: "hist" }, "hist")).toBe(false);
    });
  });

  // ===========================================================================
  // Numeric Coercion
  // ===========================================================================

  describe("toInteger", () => {
    it("strips leading zeros", () => {
      expect(toInteger("00089")).toBe(89);
    });

    it("returns 0 for missing or non-numeric text", () => {
      expect(toInteger(null)).toBe(0);
      expect(toInteger("abc")).toBe(0);
      expect(toInteger("")).toBe(0);
    });
  });

  describe("toOptionalInteger", () => {
    it("keeps absence as null", () => {
      expect(toOptionalInteger(null)).toBeNull();
    });

    it("coerces present text", () => {
      expect(toOptionalInteger("1")).toBe(1);
      expect(toOptionalInteger("x")).toBe(0);
    });
  });

  describe("toFloat", () => {
    it("parses padded decimals", () => {
      expect(toFloat("001.3")).toBe(1.3);
      expect(toFloat("00345")).toBe(345);
    });

    it("returns null for missing or non-numeric text", () => {
      expect(toFloat(null)).toBeNull();
      expect(toFloat("n/a")).toBeNull();
    });
  });
});
