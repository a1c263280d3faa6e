/**
 * Message Service Tests
 *
 * decodeMessage end to end: parse, classify, decode, log.
 */
import { pino } from "pino";
import { describe, expect, it, vi } from "vitest";

import { loadFixture } from "../../__fixtures__/index.js";
import { MalformedMessageError } from "../errors.js";
import {
  decodeMessage,
  decodeMessageOrThrow,
  decodeMessages,
} from "../service.js";
import { getHistory, getUnits, getValue } from "../transform.js";

const silent = pino({ level: "silent" });

/**
 * A debug-level logger whose JSON lines are captured for assertions.
 */
function capturingLogger() {
  const write = vi.fn<(line: string) => void>();
  const logger = pino({ level: "debug" }, { write });
  const entries = (): unknown[] =>
    write.mock.calls.map(([line]): unknown => JSON.parse(line));
  return { logger, entries };
}

describe("decodeMessage", () => {
  it("decodes an Envy live reading", () => {
    const result = decodeMessage(loadFixture("envy-reading"), {
      logger: silent,
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.deviceType).toBe("envy");
      expect(result.value.deviceName).toBe("CC128");
      expect(result.value.deviceVersion).toBe("v0.11");
      expect(getUnits(result.value)).toBe("watts");
      expect(getValue(result.value)).toBe(2496);
      expect(getValue(result.value, 1)).toBe(345);
    }
  });

  it("decodes a Classic message with history", () => {
    const result = decodeMessage(loadFixture("classic-history"), {
      logger: silent,
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.deviceType).toBe("classic");
      expect(getHistory(result.value)[0]?.hours?.[2]).toBe(1.3);
    }
  });

  it("returns MALFORMED_MESSAGE for broken markup", () => {
    const result = decodeMessage("<msg><src>CC128", { logger: silent });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("MALFORMED_MESSAGE");
      expect(result.error.cause.type).toBe("MALFORMED_MARKUP");
    }
  });

  it("returns MALFORMED_MESSAGE for empty input", () => {
    const result = decodeMessage("", { logger: silent });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("Malformed markup: Empty input");
    }
  });

  it("logs failures to the logger it is given", () => {
    const { logger, entries } = capturingLogger();

    decodeMessage("", { logger });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 40,
        operation: "decodeMessage",
        error: "Message could not be decoded: Malformed markup: Empty input",
        length: 0,
      }),
    ]);
  });

  it("logs the decoded shape at debug level", () => {
    const { logger, entries } = capturingLogger();

    decodeMessage(loadFixture("envy-history"), { logger });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 20,
        msg: "Message decoded",
        deviceType: "envy",
        device: "CC128",
        channels: 0,
        historySensors: 10,
      }),
    ]);
  });

  it("notes an unexpected root element", () => {
    const { logger, entries } = capturingLogger();

    const result = decodeMessage("<reading><src>CC128-v0.11</src></reading>", {
      logger,
    });

    expect(result.isOk()).toBe(true);
    expect(entries()[0]).toEqual(
      expect.objectContaining({ level: 20, root: "reading" }),
    );
  });
});

describe("decodeMessages", () => {
  it("returns one result per input, in order", () => {
    const results = decodeMessages(
      [loadFixture("envy-reading"), "<msg>", loadFixture("classic-reading")],
      { logger: silent },
    );

    expect(results.map((result) => result.isOk())).toEqual([true, false, true]);
  });
});

describe("decodeMessageOrThrow", () => {
  it("returns the message for valid markup", () => {
    const message = decodeMessageOrThrow(loadFixture("classic-reading"), {
      logger: silent,
    });

    expect(message.deviceName).toBe("CC02");
  });

  it("throws MalformedMessageError for broken markup", () => {
    expect(() => decodeMessageOrThrow("<msg>", { logger: silent })).toThrow(
      MalformedMessageError,
    );
  });
});
