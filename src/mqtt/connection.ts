/**
 * MQTT Module - Broker Connection
 *
 * Adapts an MQTT.js client to the session's BrokerConnection contract.
 * The client's own reconnect is switched off: the session decides when to
 * reconnect.
 */
import { type MqttClient, connectAsync } from "mqtt";

import type { BrokerConfig } from "../broker/index.js";
import type { BrokerConnection } from "./schema.js";

const CONNECT_TIMEOUT_MS = 10_000;

class MqttJsConnection implements BrokerConnection {
  private lastError: Error | null = null;

  constructor(private readonly client: MqttClient) {
    this.client.on("error", (error) => {
      this.lastError = error;
    });
  }

  onMessage(listener: (topic: string, payload: Buffer) => void): void {
    this.client.on("message", (topic, payload) => {
      listener(topic, payload);
    });
  }

  onClose(listener: (error: Error) => void): void {
    this.client.once("close", () => {
      listener(this.lastError ?? new Error("Connection closed by broker"));
    });
  }

  async subscribe(topic: string): Promise<void> {
    await this.client.subscribeAsync(topic);
  }

  async end(): Promise<void> {
    await this.client.endAsync();
  }
}

/**
 * Connect to the broker described by `config`.
 */
export async function connectMqttBroker(
  config: BrokerConfig,
): Promise<BrokerConnection> {
  const client = await connectAsync(
    `mqtt://${config.host}:${config.port}`,
    {
      clientId: config.clientId,
      username: config.username,
      password: config.password,
      reconnectPeriod: 0,
      connectTimeout: CONNECT_TIMEOUT_MS,
    },
    false,
  );
  return new MqttJsConnection(client);
}
