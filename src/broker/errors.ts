/**
 * Broker Module - Error Types
 */

/**
 * Raised when the device's MQTT settings cannot be turned into a
 * broker configuration. Fatal to MQTT start only.
 */
export type BrokerConfigError = {
  readonly type: "CONFIG_ERROR";
  readonly field: string;
  readonly message: string;
};

/**
 * Create a CONFIG_ERROR.
 */
export function configError(field: string, message: string): BrokerConfigError {
  return { type: "CONFIG_ERROR", field, message };
}

/**
 * Format a BrokerConfigError for logging.
 */
export function formatBrokerConfigError(error: BrokerConfigError): string {
  return `Invalid ${error.field}: ${error.message}`;
}
