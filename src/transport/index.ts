/**
 * Transport Module - Public API
 *
 * Exports types, the transport class, and pure request helpers.
 */

// Types
export type {
  CommandParams,
  CommandResponse,
  CommandStatus,
  TransportTarget,
} from "./schema.js";
export type { TransportError } from "./errors.js";

export { ERROR_STATUS, RESPONSE_TYPE } from "./schema.js";

// Error utilities
export { formatTransportError, invalidResponse } from "./errors.js";

// Service
export { CommandTransport } from "./service.js";

// Pure transformations
export {
  buildBaseUrl,
  buildCommandUrl,
  buildQueryParams,
  extractCommandError,
  isBinaryContentType,
  parseJsonBody,
} from "./transform.js";
