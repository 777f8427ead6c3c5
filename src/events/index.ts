/**
 * Events Module - Public API
 */

// Types
export type {
  DispatchedEvent,
  EventCallback,
  JsonObject,
  ParsedTopic,
} from "./schema.js";
export type { EventError } from "./errors.js";
export type { EventDispatcher, EventDispatcherOptions } from "./service.js";

export { DEVICE_INFO_TYPE, EVENT_TYPE, JsonObjectSchema } from "./schema.js";

// Error utilities
export { formatEventError } from "./errors.js";

// Service
export { createEventDispatcher } from "./service.js";

// Pure transformations
export {
  eventNameFor,
  parseJsonPayload,
  parseTopic,
  toJsonObject,
} from "./transform.js";
