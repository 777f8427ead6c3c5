/**
 * Kiosk Module - Public API
 */

// Types
export type {
  ClientHooks,
  ClientOptions,
  ClientOptionsInput,
  DeviceInfo,
  KioskState,
  Settings,
  StartResult,
} from "./schema.js";
export type { KioskError, StartCancelledError } from "./errors.js";

export { ClientOptionsSchema, DEFAULT_REST_PORT } from "./schema.js";

// Error utilities
export { formatKioskError } from "./errors.js";

// Client
export { FullyKiosk } from "./service.js";

// Pure transformations
export {
  parseClientOptions,
  readDeviceId,
  readReportedIp,
} from "./transform.js";
