/**
 * Kiosk Module - Error Types
 *
 * Everything a client operation can fail with.
 */
import type { BrokerConfigError } from "../broker/index.js";
import { formatBrokerConfigError } from "../broker/index.js";
import type { TransportError } from "../transport/index.js";
import { formatTransportError } from "../transport/index.js";

/**
 * A `start()` overtaken by a later `start()` or by `stop()`.
 */
export type StartCancelledError = {
  readonly type: "START_CANCELLED";
  readonly message: string;
};

export type KioskError = TransportError | BrokerConfigError | StartCancelledError;

/**
 * Create a START_CANCELLED error.
 */
export function startCancelled(reason: string): StartCancelledError {
  return { type: "START_CANCELLED", message: reason };
}

/**
 * Format a KioskError for logging.
 */
export function formatKioskError(error: KioskError): string {
  switch (error.type) {
    case "CONFIG_ERROR":
      return formatBrokerConfigError(error);
    case "START_CANCELLED":
      return `Start cancelled: ${error.message}`;
    default:
      return formatTransportError(error);
  }
}
