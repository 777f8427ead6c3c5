/**
 * Transport Module - Error Types
 *
 * Typed error union for REST command failures.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while sending a command to the device.
 */
export type TransportError =
  | {
      readonly type: "TRANSPORT_ERROR";
      readonly status: number;
      readonly body: string;
    }
  | {
      readonly type: "COMMAND_ERROR";
      readonly command: string;
      readonly status: string;
      readonly statusText: string;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly command: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly command: string;
      readonly message: string;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Create a TRANSPORT_ERROR (non-2xx HTTP status).
 */
export function transportError(status: number, body: string): TransportError {
  return { type: "TRANSPORT_ERROR", status, body };
}

/**
 * Create a COMMAND_ERROR (device reported `status: "Error"`).
 */
export function commandError(
  command: string,
  status: string,
  statusText: string,
): TransportError {
  return { type: "COMMAND_ERROR", command, status, statusText };
}

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): TransportError {
  return cause !== undefined
    ? { type: "NETWORK_ERROR", message, cause }
    : { type: "NETWORK_ERROR", message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(command: string, timeoutMs: number): TransportError {
  return { type: "TIMEOUT", command, timeoutMs };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  command: string,
  message: string,
): TransportError {
  return { type: "INVALID_RESPONSE", command, message };
}

/**
 * Format a TransportError for logging.
 */
export function formatTransportError(error: TransportError): string {
  switch (error.type) {
    case "TRANSPORT_ERROR":
      return `HTTP ${error.status}: ${error.body}`;
    case "COMMAND_ERROR":
      return `Command ${error.command} failed: ${error.statusText}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "TIMEOUT":
      return `Command ${error.command} timed out after ${error.timeoutMs}ms`;
    case "INVALID_RESPONSE":
      return `Invalid response to ${error.command}: ${error.message}`;
  }
}
