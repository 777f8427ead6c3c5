/**
 * Events Module - Service Layer
 *
 * Turns one MQTT message into an event name, keeps the device-info cache
 * current, and hands the name to the caller's callback.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { EventError } from "./errors.js";
import { callbackFailed, formatEventError } from "./errors.js";
import type {
  DispatchedEvent,
  EventCallback,
  JsonObject,
} from "./schema.js";
import {
  eventNameFor,
  parseJsonPayload,
  parseTopic,
  toJsonObject,
} from "./transform.js";

const log = createLogger("events");

export type EventDispatcherOptions = {
  /** Receives every device-info payload; the owner replaces its cache. */
  onDeviceInfo: (deviceInfo: JsonObject) => void;
  /** Caller's callback, if any. */
  onEvent?: EventCallback | undefined;
};

export type EventDispatcher = (
  topic: string,
  payload: Buffer | string,
) => Result<DispatchedEvent, EventError>;

/**
 * Create the dispatch function for one client.
 *
 * Decode failures come back as errors for the listener to report. The
 * callback runs on a later microtask, so neither a slow nor a throwing
 * callback holds up the next message.
 */
export function createEventDispatcher(
  options: EventDispatcherOptions,
): EventDispatcher {
  return (topic, payload) => {
    const parsedTopic = parseTopic(topic);

    const decoded = parseJsonPayload(topic, payload);
    if (decoded.isErr()) {
      return err(decoded.error);
    }

    if (parsedTopic.kind === "deviceInfo") {
      const deviceInfo = toJsonObject(topic, decoded.value);
      if (deviceInfo.isErr()) {
        return err(deviceInfo.error);
      }
      options.onDeviceInfo(deviceInfo.value);
    }

    const name = eventNameFor(parsedTopic);
    log.debug({ topic, event: name }, "Dispatching event");

    if (options.onEvent) {
      invokeCallback(options.onEvent, name);
    }

    return ok({ name, topic: parsedTopic });
  };
}

/**
 * Run the callback detached from the caller's stack; failures are logged.
 */
function invokeCallback(callback: EventCallback, eventName: string): void {
  void Promise.resolve()
    .then(() => callback(eventName))
    .catch((error: unknown) => {
      log.error(
        { event: eventName },
        formatEventError(callbackFailed(eventName, error)),
      );
    });
}
