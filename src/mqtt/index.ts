/**
 * MQTT Module - Public API
 *
 * Exports the session manager, the default broker connector, and the
 * connection contract for custom connectors.
 */

// Types
export type {
  BrokerConnection,
  BrokerConnector,
  MqttMessage,
  MqttSessionOptions,
  SessionState,
} from "./schema.js";
export type { SessionError, SessionStage } from "./errors.js";

// Error utilities
export { formatSessionError, isAbortError } from "./errors.js";

// Service
export { connectMqttBroker } from "./connection.js";
export { MqttSession } from "./service.js";
export { MessageStream } from "./stream.js";

// Pure transformations
export { matchingFilters, topicMatches } from "./transform.js";
