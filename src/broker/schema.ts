/**
 * Broker Module - Schemas and Types
 *
 * MQTT fields of the device's `listSettings` document and the broker
 * parameters derived from them.
 */
import { z } from "zod";

// =============================================================================
// Constants
// =============================================================================

/**
 * Application id the device prefixes every MQTT topic with.
 */
export const APP_NAMESPACE = "fully";

/**
 * Prefix for our client id, so it never collides with the device's own
 * MQTT identity on the broker.
 */
export const CLIENT_ID_PREFIX = "ha-";

/**
 * Topic templates as the device app writes them in its settings.
 */
export const DEFAULT_DEVICE_INFO_TOPIC_TEMPLATE = "$appId/deviceInfo/$deviceId";
export const DEFAULT_EVENT_TOPIC_TEMPLATE = "$appId/event/$event/$deviceId";

// =============================================================================
// Settings
// =============================================================================

/**
 * The device reports booleans as JSON booleans; some firmware sends strings.
 */
const settingsBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) =>
    typeof val === "boolean" ? val : val.trim().toLowerCase() === "true",
  );

/**
 * Just the MQTT switch. Read before anything else so that a device with
 * MQTT off never has its broker fields validated.
 */
export const MqttEnabledSchema = z.object({
  mqttEnabled: settingsBoolean.catch(false),
});

/**
 * MQTT-related fields of the settings document. Other fields pass through.
 */
export const MqttSettingsSchema = z
  .object({
    mqttEnabled: settingsBoolean.default(false),
    mqttBrokerUrl: z.string().default(""),
    mqttBrokerUsername: z.string().default(""),
    mqttBrokerPassword: z.string().default(""),
    mqttClientId: z.string().default(""),
    mqttDeviceInfoTopic: z
      .string()
      .default(DEFAULT_DEVICE_INFO_TOPIC_TEMPLATE),
    mqttEventTopic: z.string().default(DEFAULT_EVENT_TOPIC_TEMPLATE),
  })
  .passthrough();

export type MqttSettings = z.infer<typeof MqttSettingsSchema>;

// =============================================================================
// Broker Configuration
// =============================================================================

/**
 * Connection parameters for one MQTT session. Computed once per start and
 * never mutated.
 */
export type BrokerConfig = Readonly<{
  host: string;
  port: number;
  clientId: string;
  username: string | undefined;
  password: string | undefined;
  deviceInfoTopic: string;
  eventTopic: string;
}>;

/**
 * The two topic filters watched per session.
 */
export type DeviceTopics = Readonly<{
  deviceInfoTopic: string;
  eventTopic: string;
}>;

/**
 * Values substituted into a topic template.
 */
export type TopicTemplateValues = Readonly<{
  appId: string;
  deviceId: string;
  event: string;
}>;
