/**
 * Kiosk Module - Schemas and Types
 *
 * Client options and the device state cached by one client.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

import { config } from "../config.js";
import type { EventCallback, JsonObject } from "../events/index.js";
import type { BrokerConnector, SessionState } from "../mqtt/index.js";

// =============================================================================
// Client Options
// =============================================================================

export const DEFAULT_REST_PORT = 2323;

export const ClientOptionsSchema = z.object({
  host: z.string().min(1, "host is required").describe("Device IP or hostname"),
  port: z
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(DEFAULT_REST_PORT)
    .describe("Remote-admin port"),
  password: z
    .string()
    .min(1, "password is required")
    .describe("Remote-admin password"),
  useSsl: z.boolean().default(false).describe("Use https"),
  useMqttIfAvailable: z
    .boolean()
    .default(true)
    .describe("Listen over MQTT when the device has it enabled"),
  requestTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(config.FULLY_REQUEST_TIMEOUT_MS)
    .describe("Timeout for a single command (ms)"),
  reconnectIntervalMs: z
    .number()
    .int()
    .nonnegative()
    .default(config.FULLY_MQTT_RECONNECT_INTERVAL_MS)
    .describe("Delay between MQTT reconnect attempts (ms)"),
  maxReconnectAttempts: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Give up after this many consecutive failures (unbounded if unset)"),
});

export type ClientOptions = z.infer<typeof ClientOptionsSchema>;

/**
 * Collaborators passed alongside the validated options.
 */
export type ClientHooks = {
  /** Called with the event name of every MQTT message. */
  onEvent?: EventCallback | undefined;
  /** Replaces the MQTT.js connector (tests, custom transports). */
  connectBroker?: BrokerConnector | undefined;
  /** Reports every MQTT session state change. */
  onMqttStateChange?: ((state: SessionState) => void) | undefined;
};

export type ClientOptionsInput = z.input<typeof ClientOptionsSchema> &
  ClientHooks;

// =============================================================================
// Device State
// =============================================================================

/**
 * Document returned by the `deviceInfo` command (and MQTT deviceInfo
 * messages). Includes `deviceID` and `ip4`.
 */
export type DeviceInfo = JsonObject;

/**
 * Document returned by the `listSettings` command.
 */
export type Settings = JsonObject;

/**
 * Most recently fetched documents, owned by one client instance.
 */
export type KioskState = Readonly<{
  deviceInfo: DeviceInfo | null;
  settings: Settings | null;
}>;

export const INITIAL_KIOSK_STATE: KioskState = {
  deviceInfo: null,
  settings: null,
};

/**
 * Fields of the device-info document the client relies on.
 */
export const DeviceIdentitySchema = z.object({
  deviceID: z.string().min(1),
  ip4: z.string().optional(),
});

// =============================================================================
// Start
// =============================================================================

export type StartResult = Readonly<{
  /** Whether device events now arrive over MQTT. */
  usingMqtt: boolean;
}>;
