/**
 * Events Module - Pure Transformations
 *
 * Topic classification and payload decoding.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { EventError } from "./errors.js";
import { decodeError } from "./errors.js";
import type { JsonObject, ParsedTopic } from "./schema.js";
import { DEVICE_INFO_TYPE, EVENT_TYPE, JsonObjectSchema } from "./schema.js";

// =============================================================================
// Topics
// =============================================================================

/**
 * Classify a topic by its second segment.
 *
 * @example
 * parseTopic("fully/event/screenOn/ABC123")
 * // { kind: "event", eventName: "screenOn", deviceId: "ABC123" }
 */
export function parseTopic(topic: string): ParsedTopic {
  const segments = topic.split("/");
  const type = segments[1] ?? "";

  if (type === DEVICE_INFO_TYPE) {
    return { kind: "deviceInfo", deviceId: segments[2] ?? null };
  }

  const eventName = segments[2];
  if (type === EVENT_TYPE && eventName !== undefined && eventName !== "") {
    return { kind: "event", eventName, deviceId: segments[3] ?? null };
  }

  return { kind: "other", type, deviceId: null };
}

/**
 * Name handed to the caller's callback for a topic.
 */
export function eventNameFor(topic: ParsedTopic): string {
  switch (topic.kind) {
    case "deviceInfo":
      return DEVICE_INFO_TYPE;
    case "event":
      return topic.eventName;
    case "other":
      return topic.type;
  }
}

// =============================================================================
// Payloads
// =============================================================================

/**
 * Decode a UTF-8 JSON payload.
 */
export function parseJsonPayload(
  topic: string,
  payload: Buffer | string,
): Result<unknown, EventError> {
  const text = typeof payload === "string" ? payload : payload.toString("utf8");

  try {
    const data: unknown = JSON.parse(text);
    return ok(data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(decodeError(topic, message));
  }
}

/**
 * Narrow a decoded payload to a JSON object.
 */
export function toJsonObject(
  topic: string,
  data: unknown,
): Result<JsonObject, EventError> {
  const parsed = JsonObjectSchema.safeParse(data);
  if (!parsed.success) {
    return err(decodeError(topic, "Payload is not a JSON object"));
  }
  return ok(parsed.data);
}
