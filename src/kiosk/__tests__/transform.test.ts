/**
 * Kiosk Module - Transform Tests
 *
 * Option validation, device identity and state updates.
 */
import { describe, expect, it } from "vitest";

import { DEFAULT_REST_PORT, INITIAL_KIOSK_STATE } from "../schema.js";
import {
  parseClientOptions,
  readDeviceId,
  readReportedIp,
  withDeviceInfo,
  withSettings,
} from "../transform.js";

// =============================================================================
// parseClientOptions Tests
// =============================================================================

describe("parseClientOptions", () => {
  it("fills in defaults", () => {
    const result = parseClientOptions({
      host: "192.168.1.20",
      password: "test-secret",
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.port).toBe(DEFAULT_REST_PORT);
      expect(result.value.useSsl).toBe(false);
      expect(result.value.useMqttIfAvailable).toBe(true);
      expect(result.value.requestTimeoutMs).toBe(10_000);
      expect(result.value.reconnectIntervalMs).toBe(3_000);
      expect(result.value.maxReconnectAttempts).toBeUndefined();
    }
  });

  it("keeps explicit values", () => {
    const result = parseClientOptions({
      host: "kiosk.lan",
      port: 2443,
      password: "test-secret",
      useSsl: true,
      useMqttIfAvailable: false,
      maxReconnectAttempts: 5,
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toMatchObject({
        host: "kiosk.lan",
        port: 2443,
        useSsl: true,
        useMqttIfAvailable: false,
        maxReconnectAttempts: 5,
      });
    }
  });

  it("returns CONFIG_ERROR naming the missing field", () => {
    const result = parseClientOptions({ host: "", password: "test-secret" });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: "CONFIG_ERROR",
        field: "host",
        message: "host is required",
      });
    }
  });

  it("rejects an out-of-range port", () => {
    const result = parseClientOptions({
      host: "kiosk.lan",
      port: 0,
      password: "test-secret",
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.field).toBe("port");
    }
  });

  it("rejects input that is not an object", () => {
    const result = parseClientOptions(null);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.field).toBe("options");
    }
  });
});

// =============================================================================
// Device Identity Tests
// =============================================================================

describe("readDeviceId", () => {
  it("returns the deviceID", () => {
    expect(readDeviceId({ deviceID: "abc123" })).toBe("abc123");
  });

  it("returns null when missing or empty", () => {
    expect(readDeviceId({})).toBeNull();
    expect(readDeviceId({ deviceID: "" })).toBeNull();
    expect(readDeviceId({ deviceID: 42 })).toBeNull();
  });
});

describe("readReportedIp", () => {
  it("returns the reported ip4", () => {
    expect(readReportedIp({ deviceID: "abc123", ip4: "192.168.1.99" })).toBe(
      "192.168.1.99",
    );
  });

  it("returns null when absent, empty or not a string", () => {
    expect(readReportedIp({ deviceID: "abc123" })).toBeNull();
    expect(readReportedIp({ ip4: "" })).toBeNull();
    expect(readReportedIp({ ip4: 17 })).toBeNull();
  });
});

// =============================================================================
// State Update Tests
// =============================================================================

describe("state updates", () => {
  it("replaces the device-info document without touching settings", () => {
    const withBoth = withSettings(INITIAL_KIOSK_STATE, { startURL: "a" });

    const next = withDeviceInfo(withBoth, { deviceID: "abc123" });

    expect(next).toEqual({
      deviceInfo: { deviceID: "abc123" },
      settings: { startURL: "a" },
    });
    expect(withBoth.deviceInfo).toBeNull();
  });
});
