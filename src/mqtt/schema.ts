/**
 * MQTT Module - Schemas and Types
 *
 * Session lifecycle states and the narrow broker-connection contract the
 * session is written against.
 */
import type { BrokerConfig } from "../broker/index.js";

// =============================================================================
// Session State
// =============================================================================

/**
 * idle → connecting → subscribed → disconnected → connecting …
 * Any state → shuttingDown → idle on stop.
 */
export type SessionState =
  | "idle"
  | "connecting"
  | "subscribed"
  | "disconnected"
  | "shuttingDown";

/**
 * One message as received from the broker.
 */
export type MqttMessage = Readonly<{
  topic: string;
  payload: Buffer;
}>;

// =============================================================================
// Broker Connection
// =============================================================================

/**
 * What a session needs from a live broker connection.
 */
export interface BrokerConnection {
  /** Register a listener for every incoming message. */
  onMessage(listener: (topic: string, payload: Buffer) => void): void;
  /** Register a listener for loss of the connection. */
  onClose(listener: (error: Error) => void): void;
  /** Subscribe and wait for the broker's acknowledgement. */
  subscribe(topic: string): Promise<void>;
  /** Close the connection. */
  end(): Promise<void>;
}

/**
 * Opens a connection; rejects when the broker cannot be reached.
 */
export type BrokerConnector = (config: BrokerConfig) => Promise<BrokerConnection>;

// =============================================================================
// Session Options
// =============================================================================

export type MqttSessionOptions = Readonly<{
  broker: BrokerConfig;
  /** Handles one message; failures are reported, never thrown. */
  onMessage: (message: MqttMessage) => void;
  connect: BrokerConnector;
  reconnectIntervalMs: number;
  /** Consecutive failed sessions before giving up; unbounded when absent. */
  maxReconnectAttempts?: number | undefined;
  onStateChange?: ((state: SessionState) => void) | undefined;
}>;
