/**
 * Broker Module - Public API
 */

// Types
export type {
  BrokerConfig,
  DeviceTopics,
  MqttSettings,
  TopicTemplateValues,
} from "./schema.js";
export type { BrokerConfigError } from "./errors.js";

export {
  APP_NAMESPACE,
  CLIENT_ID_PREFIX,
  MqttEnabledSchema,
  MqttSettingsSchema,
} from "./schema.js";

// Error utilities
export { configError, formatBrokerConfigError } from "./errors.js";

// Pure transformations
export {
  buildTopics,
  expandTopicTemplate,
  isMqttRequested,
  parseBrokerUrl,
  parseMqttSettings,
  readMqttEnabled,
  resolveBrokerConfig,
} from "./transform.js";
