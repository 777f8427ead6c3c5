/**
 * Events Module - Error Types
 *
 * A bad message is reported and dropped; it never ends the session.
 */

export type EventError =
  | {
      readonly type: "DECODE_ERROR";
      readonly topic: string;
      readonly message: string;
    }
  | {
      readonly type: "CALLBACK_FAILED";
      readonly eventName: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a DECODE_ERROR.
 */
export function decodeError(topic: string, message: string): EventError {
  return { type: "DECODE_ERROR", topic, message };
}

/**
 * Create a CALLBACK_FAILED error.
 */
export function callbackFailed(eventName: string, cause: unknown): EventError {
  if (cause instanceof Error) {
    return {
      type: "CALLBACK_FAILED",
      eventName,
      message: cause.message,
      cause,
    };
  }
  return { type: "CALLBACK_FAILED", eventName, message: String(cause) };
}

/**
 * Format an EventError for logging.
 */
export function formatEventError(error: EventError): string {
  switch (error.type) {
    case "DECODE_ERROR":
      return `Cannot decode message on ${error.topic}: ${error.message}`;
    case "CALLBACK_FAILED":
      return `Event callback for ${error.eventName} failed: ${error.message}`;
  }
}
