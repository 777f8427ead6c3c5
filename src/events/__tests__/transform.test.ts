/**
 * Events Module - Transform Tests
 *
 * Topic classification and payload decoding.
 */
import { describe, expect, it } from "vitest";

import {
  eventNameFor,
  parseJsonPayload,
  parseTopic,
  toJsonObject,
} from "../transform.js";

// =============================================================================
// parseTopic Tests
// =============================================================================

describe("parseTopic", () => {
  it("recognises device-info topics", () => {
    expect(parseTopic("fully/deviceInfo/abc123")).toEqual({
      kind: "deviceInfo",
      deviceId: "abc123",
    });
  });

  it("recognises event topics", () => {
    expect(parseTopic("fully/event/screenOff/abc123")).toEqual({
      kind: "event",
      eventName: "screenOff",
      deviceId: "abc123",
    });
  });

  it("keeps the second segment of unknown topics", () => {
    expect(parseTopic("fully/status/abc123")).toEqual({
      kind: "other",
      type: "status",
      deviceId: null,
    });
  });

  it("treats an event topic without a name as other", () => {
    expect(parseTopic("fully/event")).toEqual({
      kind: "other",
      type: "event",
      deviceId: null,
    });
  });

  it("handles a single-segment topic", () => {
    expect(parseTopic("fully")).toEqual({
      kind: "other",
      type: "",
      deviceId: null,
    });
  });
});

// =============================================================================
// eventNameFor Tests
// =============================================================================

describe("eventNameFor", () => {
  it("names device-info messages deviceInfo", () => {
    expect(eventNameFor(parseTopic("fully/deviceInfo/abc123"))).toBe(
      "deviceInfo",
    );
  });

  it("uses the event segment for events", () => {
    expect(eventNameFor(parseTopic("fully/event/onMotion/abc123"))).toBe(
      "onMotion",
    );
  });

  it("uses the type segment for anything else", () => {
    expect(eventNameFor(parseTopic("fully/status/abc123"))).toBe("status");
  });
});

// =============================================================================
// Payload Tests
// =============================================================================

describe("parseJsonPayload", () => {
  it("decodes a UTF-8 buffer", () => {
    const result = parseJsonPayload(
      "fully/event/screenOn/abc123",
      Buffer.from('{"event":"screenOn"}', "utf8"),
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ event: "screenOn" });
    }
  });

  it("returns DECODE_ERROR for malformed JSON", () => {
    const result = parseJsonPayload("fully/event/screenOn/abc123", "{oops");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("DECODE_ERROR");
      if (result.error.type === "DECODE_ERROR") {
        expect(result.error.topic).toBe("fully/event/screenOn/abc123");
      }
    }
  });
});

describe("toJsonObject", () => {
  it("accepts objects", () => {
    const result = toJsonObject("fully/deviceInfo/abc123", { deviceID: "abc123" });

    expect(result.isOk()).toBe(true);
  });

  it("rejects arrays, scalars and null", () => {
    for (const value of [[1, 2], "text", 42, null]) {
      const result = toJsonObject("fully/deviceInfo/abc123", value);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          type: "DECODE_ERROR",
          topic: "fully/deviceInfo/abc123",
          message: "Payload is not a JSON object",
        });
      }
    }
  });
});
