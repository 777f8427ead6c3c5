/**
 * Events Module - Schemas and Types
 *
 * Shapes of incoming MQTT messages from the device and the events they
 * are turned into.
 */
import { z } from "zod";

// =============================================================================
// Payloads
// =============================================================================

/**
 * A JSON object; device-info payloads must be one.
 */
export const JsonObjectSchema = z.record(z.string(), z.unknown());

export type JsonObject = Readonly<z.infer<typeof JsonObjectSchema>>;

// =============================================================================
// Topics
// =============================================================================

/**
 * Message type literals in the second topic segment.
 */
export const DEVICE_INFO_TYPE = "deviceInfo";
export const EVENT_TYPE = "event";

/**
 * A topic split into what it means.
 *
 * - `fully/deviceInfo/{deviceId}` → deviceInfo
 * - `fully/event/{eventName}/{deviceId}` → event
 * - anything else → other, carrying the second segment verbatim
 */
export type ParsedTopic =
  | Readonly<{ kind: "deviceInfo"; deviceId: string | null }>
  | Readonly<{ kind: "event"; eventName: string; deviceId: string | null }>
  | Readonly<{ kind: "other"; type: string; deviceId: string | null }>;

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Caller-supplied callback, invoked with the event name of every message.
 */
export type EventCallback = (eventName: string) => void | Promise<void>;

/**
 * Result of dispatching one message.
 */
export type DispatchedEvent = Readonly<{
  name: string;
  topic: ParsedTopic;
}>;
