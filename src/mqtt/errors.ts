/**
 * MQTT Module - Error Types
 *
 * Broker failures are logged and retried by the session loop; they never
 * reach the caller.
 */

export type SessionStage = "connect" | "subscribe" | "connection";

export type SessionError = {
  readonly type: "BROKER_ERROR";
  readonly stage: SessionStage;
  readonly message: string;
  readonly cause?: Error;
};

/**
 * Create a BROKER_ERROR.
 */
export function brokerError(stage: SessionStage, cause: unknown): SessionError {
  if (cause instanceof Error) {
    return { type: "BROKER_ERROR", stage, message: cause.message, cause };
  }
  return { type: "BROKER_ERROR", stage, message: String(cause) };
}

/**
 * Format a SessionError for logging.
 */
export function formatSessionError(error: SessionError): string {
  switch (error.stage) {
    case "connect":
      return `Cannot connect to broker: ${error.message}`;
    case "subscribe":
      return `Subscribe failed: ${error.message}`;
    case "connection":
      return `Connection lost: ${error.message}`;
  }
}

/**
 * Cancellation of a listener task surfaces as an AbortError.
 */
export function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "AbortError"
  );
}
