/**
 * Kiosk Module - Pure Transformations
 *
 * Option validation and immutable state updates.
 */
import { type Result, err, ok } from "neverthrow";

import type { BrokerConfigError } from "../broker/index.js";
import { configError } from "../broker/index.js";
import type {
  ClientOptions,
  DeviceInfo,
  KioskState,
  Settings,
} from "./schema.js";
import { ClientOptionsSchema, DeviceIdentitySchema } from "./schema.js";

// =============================================================================
// Options
// =============================================================================

/**
 * Validate client options and fill in defaults.
 */
export function parseClientOptions(
  input: unknown,
): Result<ClientOptions, BrokerConfigError> {
  const parsed = ClientOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(
      configError(
        issue?.path.join(".") || "options",
        issue?.message ?? "Invalid client options",
      ),
    );
  }
  return ok(parsed.data);
}

// =============================================================================
// Device Identity
// =============================================================================

/**
 * `deviceID` of a device-info document, or null when absent.
 */
export function readDeviceId(deviceInfo: DeviceInfo): string | null {
  const parsed = DeviceIdentitySchema.safeParse(deviceInfo);
  return parsed.success ? parsed.data.deviceID : null;
}

/**
 * IP address the device reports for itself, or null when absent.
 */
export function readReportedIp(deviceInfo: DeviceInfo): string | null {
  const ip = DeviceIdentitySchema.shape.ip4.safeParse(deviceInfo["ip4"]);
  return ip.success && ip.data ? ip.data : null;
}

// =============================================================================
// State Updates (Immutable)
// =============================================================================

/**
 * Replace the cached device-info document.
 */
export function withDeviceInfo(
  state: KioskState,
  deviceInfo: DeviceInfo,
): KioskState {
  return { ...state, deviceInfo };
}

/**
 * Replace the cached settings document.
 */
export function withSettings(
  state: KioskState,
  settings: Settings,
): KioskState {
  return { ...state, settings };
}
