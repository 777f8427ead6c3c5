/**
 * Broker Module - Pure Transformations
 *
 * Turns a just-fetched settings document into broker connection
 * parameters. No side effects, no I/O.
 */
import { type Result, err, ok } from "neverthrow";

import type { BrokerConfigError } from "./errors.js";
import { configError } from "./errors.js";
import type {
  BrokerConfig,
  DeviceTopics,
  MqttSettings,
  TopicTemplateValues,
} from "./schema.js";
import {
  APP_NAMESPACE,
  CLIENT_ID_PREFIX,
  DEFAULT_DEVICE_INFO_TOPIC_TEMPLATE,
  DEFAULT_EVENT_TOPIC_TEMPLATE,
  MqttEnabledSchema,
  MqttSettingsSchema,
} from "./schema.js";

// =============================================================================
// Settings
// =============================================================================

/**
 * Read the MQTT fields of a settings document.
 */
export function parseMqttSettings(
  settings: unknown,
): Result<MqttSettings, BrokerConfigError> {
  const parsed = MqttSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(
      configError(
        issue?.path.join(".") || "settings",
        issue?.message ?? "Invalid settings document",
      ),
    );
  }
  return ok(parsed.data);
}

/**
 * Whether the device has MQTT switched on. Missing or unreadable values
 * count as off.
 */
export function readMqttEnabled(settings: unknown): boolean {
  const parsed = MqttEnabledSchema.safeParse(settings);
  return parsed.success && parsed.data.mqttEnabled;
}

/**
 * MQTT is used only when the device has it switched on and the caller
 * asked for it.
 */
export function isMqttRequested(
  settings: unknown,
  useMqttIfAvailable: boolean,
): boolean {
  return useMqttIfAvailable && readMqttEnabled(settings);
}

// =============================================================================
// Broker URL
// =============================================================================

/**
 * Split a broker URL of the form `[http://]host:port`.
 *
 * Only a literal `http://` prefix is stripped; the remainder is split on
 * the first colon and must yield exactly a host and an integer port.
 */
export function parseBrokerUrl(
  brokerUrl: string,
): Result<{ host: string; port: number }, BrokerConfigError> {
  const stripped = brokerUrl.replace("http://", "");
  const separator = stripped.indexOf(":");

  if (separator === -1) {
    return err(
      configError("mqttBrokerUrl", `No port in broker URL "${brokerUrl}"`),
    );
  }

  const host = stripped.slice(0, separator).trim();
  const portText = stripped.slice(separator + 1).trim();

  if (host === "") {
    return err(
      configError("mqttBrokerUrl", `No host in broker URL "${brokerUrl}"`),
    );
  }

  if (!/^\d+$/.test(portText)) {
    return err(
      configError("mqttBrokerUrl", `Port "${portText}" is not an integer`),
    );
  }

  const port = Number.parseInt(portText, 10);
  if (port < 1 || port > 65535) {
    return err(configError("mqttBrokerUrl", `Port ${port} is out of range`));
  }

  return ok({ host, port });
}

// =============================================================================
// Topics
// =============================================================================

/**
 * Substitute `$appId`, `$deviceId` and `$event` in a topic template.
 */
export function expandTopicTemplate(
  template: string,
  values: TopicTemplateValues,
): string {
  return template
    .replaceAll("$appId", values.appId)
    .replaceAll("$deviceId", values.deviceId)
    .replaceAll("$event", values.event);
}

/**
 * Topic filters for one device: its device-info topic and a wildcard over
 * all of its events.
 */
export function buildTopics(deviceId: string): DeviceTopics {
  const values = { appId: APP_NAMESPACE, deviceId, event: "+" };
  return {
    deviceInfoTopic: expandTopicTemplate(
      DEFAULT_DEVICE_INFO_TOPIC_TEMPLATE,
      values,
    ),
    eventTopic: expandTopicTemplate(DEFAULT_EVENT_TOPIC_TEMPLATE, values),
  };
}

// =============================================================================
// Broker Configuration
// =============================================================================

/**
 * Resolve broker parameters from a settings document.
 *
 * @param settings - Document returned by `listSettings`
 * @param deviceId - `deviceID` from the device-info document
 */
export function resolveBrokerConfig(
  settings: unknown,
  deviceId: string,
): Result<BrokerConfig, BrokerConfigError> {
  return parseMqttSettings(settings).andThen((mqtt) =>
    parseBrokerUrl(mqtt.mqttBrokerUrl).map(({ host, port }) => ({
      host,
      port,
      clientId: `${CLIENT_ID_PREFIX}${mqtt.mqttClientId}`,
      username: mqtt.mqttBrokerUsername || undefined,
      password: mqtt.mqttBrokerPassword || undefined,
      ...buildTopics(deviceId),
    })),
  );
}
