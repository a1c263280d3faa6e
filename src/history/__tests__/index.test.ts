/**
 * History Module - Public API Tests
 */
import { describe, expect, it } from "vitest";

import * as history from "../index.js";

describe("History Public API", () => {
  it("exports only what other modules use", () => {
    expect(Object.keys(history).sort()).toEqual([
      "SPAN_KINDS",
      "parseAgeTag",
      "parseClassicHistory",
      "parseEnvyHistory",
      "parseHistoryBlock",
      "scanSpan",
      "sortedKeys",
      "spanForPrefix",
      "splitDataBlocks",
    ]);
  });
});
