/**
 * Events Service Tests
 *
 * Dispatching MQTT messages to the device-info cache and the callback.
 */
import { describe, expect, test, vi } from "vitest";

// Mock logger
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// Import after mocks
import type { JsonObject } from "../schema.js";
import { createEventDispatcher } from "../service.js";

describe("createEventDispatcher", () => {
  test("hands event names to the callback", async () => {
    const onEvent = vi.fn();
    const onDeviceInfo = vi.fn();
    const dispatch = createEventDispatcher({ onDeviceInfo, onEvent });

    const result = dispatch("fully/event/screenOff/abc123", "{}");

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.name).toBe("screenOff");
    }
    await vi.waitFor(() => expect(onEvent).toHaveBeenCalledWith("screenOff"));
    expect(onDeviceInfo).not.toHaveBeenCalled();
  });

  test("replaces the device-info cache before the callback runs", async () => {
    const seen: Array<{ event: string; battery: unknown }> = [];
    let cache: JsonObject = {};
    const dispatch = createEventDispatcher({
      onDeviceInfo: (info) => {
        cache = info;
      },
      onEvent: (event) => {
        seen.push({ event, battery: cache["batteryLevel"] });
      },
    });

    dispatch(
      "fully/deviceInfo/abc123",
      Buffer.from('{"deviceID":"abc123","batteryLevel":64}'),
    );

    expect(cache).toEqual({ deviceID: "abc123", batteryLevel: 64 });
    await vi.waitFor(() =>
      expect(seen).toEqual([{ event: "deviceInfo", battery: 64 }]),
    );
  });

  test("returns DECODE_ERROR and skips the callback for bad JSON", async () => {
    const onEvent = vi.fn();
    const dispatch = createEventDispatcher({ onDeviceInfo: vi.fn(), onEvent });

    const result = dispatch("fully/event/screenOn/abc123", "not json");
    await Promise.resolve();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("DECODE_ERROR");
    }
    expect(onEvent).not.toHaveBeenCalled();
  });

  test("rejects a device-info payload that is not an object", () => {
    const onDeviceInfo = vi.fn();
    const dispatch = createEventDispatcher({ onDeviceInfo });

    const result = dispatch("fully/deviceInfo/abc123", "[1,2,3]");

    expect(result.isErr()).toBe(true);
    expect(onDeviceInfo).not.toHaveBeenCalled();
  });

  test("accepts any JSON payload on event topics", () => {
    const dispatch = createEventDispatcher({ onDeviceInfo: vi.fn() });

    const result = dispatch("fully/event/onMotion/abc123", "null");

    expect(result.isOk()).toBe(true);
  });

  test("does not call the callback synchronously", () => {
    const onEvent = vi.fn();
    const dispatch = createEventDispatcher({ onDeviceInfo: vi.fn(), onEvent });

    dispatch("fully/event/screenOn/abc123", "{}");

    expect(onEvent).not.toHaveBeenCalled();
  });

  test("survives a callback that throws", async () => {
    const onEvent = vi
      .fn()
      .mockImplementationOnce(() => {
        throw new Error("callback broke");
      })
      .mockImplementation(() => undefined);
    const dispatch = createEventDispatcher({ onDeviceInfo: vi.fn(), onEvent });

    dispatch("fully/event/screenOn/abc123", "{}");
    const second = dispatch("fully/event/screenOff/abc123", "{}");

    expect(second.isOk()).toBe(true);
    await vi.waitFor(() => expect(onEvent).toHaveBeenCalledTimes(2));
    expect(onEvent).toHaveBeenLastCalledWith("screenOff");
  });

  test("survives a callback that rejects", async () => {
    const onEvent = vi.fn(async () => {
      throw new Error("async failure");
    });
    const dispatch = createEventDispatcher({ onDeviceInfo: vi.fn(), onEvent });

    const result = dispatch("fully/event/screenOn/abc123", "{}");

    expect(result.isOk()).toBe(true);
    await vi.waitFor(() => expect(onEvent).toHaveBeenCalledTimes(1));
  });
});
