/**
 * Fully Kiosk Browser client - package entry point.
 *
 * `FullyKiosk` is the client; the module exports below are for callers
 * that want the pieces (custom MQTT connectors, topic parsing, ...).
 */

export {
  ClientOptionsSchema,
  DEFAULT_REST_PORT,
  FullyKiosk,
  formatKioskError,
} from "./kiosk/index.js";
export type {
  ClientHooks,
  ClientOptions,
  ClientOptionsInput,
  DeviceInfo,
  KioskError,
  Settings,
  StartCancelledError,
  StartResult,
} from "./kiosk/index.js";

export {
  CommandTransport,
  ERROR_STATUS,
  formatTransportError,
} from "./transport/index.js";
export type {
  CommandParams,
  CommandResponse,
  TransportError,
} from "./transport/index.js";

export {
  APP_NAMESPACE,
  buildTopics,
  formatBrokerConfigError,
  parseBrokerUrl,
  readMqttEnabled,
  resolveBrokerConfig,
} from "./broker/index.js";
export type { BrokerConfig, BrokerConfigError } from "./broker/index.js";

export {
  MqttSession,
  connectMqttBroker,
  formatSessionError,
  topicMatches,
} from "./mqtt/index.js";
export type {
  BrokerConnection,
  BrokerConnector,
  MqttMessage,
  SessionState,
} from "./mqtt/index.js";

export {
  createEventDispatcher,
  eventNameFor,
  formatEventError,
  parseTopic,
} from "./events/index.js";
export type {
  EventCallback,
  EventError,
  JsonObject,
  ParsedTopic,
} from "./events/index.js";
