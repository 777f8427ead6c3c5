/**
 * MQTT.js Adapter Tests
 *
 * The mqtt package is replaced with an EventEmitter-backed client.
 */
import { afterEach, describe, expect, test, vi } from "vitest";

vi.mock("mqtt", async () => {
  const { EventEmitter } = await import("node:events");
  const client = Object.assign(new EventEmitter(), {
    subscribeAsync: vi.fn(async () => []),
    endAsync: vi.fn(async () => undefined),
  });
  return { connectAsync: vi.fn(async () => client) };
});

// Import after mocks
import { type MqttClient, connectAsync } from "mqtt";

import type { BrokerConfig } from "../../broker/index.js";
import { connectMqttBroker } from "../connection.js";

const broker: BrokerConfig = {
  host: "10.0.0.5",
  port: 1883,
  clientId: "ha-tablet",
  username: "kiosk",
  password: "test-secret",
  deviceInfoTopic: "fully/deviceInfo/abc123",
  eventTopic: "fully/event/+/abc123",
};

async function mockedClient(): Promise<MqttClient> {
  const client = await vi.mocked(connectAsync).mock.results[0]?.value;
  if (!client) throw new Error("connectAsync was not called");
  return client;
}

describe("connectMqttBroker", () => {
  afterEach(async () => {
    const client = await mockedClient();
    client.removeAllListeners();
    vi.clearAllMocks();
  });

  test("connects without client-side reconnect", async () => {
    await connectMqttBroker(broker);

    expect(connectAsync).toHaveBeenCalledWith(
      "mqtt://10.0.0.5:1883",
      {
        clientId: "ha-tablet",
        username: "kiosk",
        password: "test-secret",
        reconnectPeriod: 0,
        connectTimeout: 10_000,
      },
      false,
    );
  });

  test("forwards messages", async () => {
    const connection = await connectMqttBroker(broker);
    const client = await mockedClient();
    const received: Array<[string, string]> = [];
    connection.onMessage((topic, payload) => {
      received.push([topic, payload.toString("utf8")]);
    });

    client.emit("message", "fully/event/screenOn/abc123", Buffer.from("{}"), {
      cmd: "publish",
      qos: 0,
      dup: false,
      retain: false,
      topic: "fully/event/screenOn/abc123",
      payload: Buffer.from("{}"),
    });

    expect(received).toEqual([["fully/event/screenOn/abc123", "{}"]]);
  });

  test("reports the last client error when the connection closes", async () => {
    const connection = await connectMqttBroker(broker);
    const client = await mockedClient();
    const closed = vi.fn();
    connection.onClose(closed);

    client.emit("error", new Error("read ECONNRESET"));
    client.emit("close");
    client.emit("close");

    expect(closed).toHaveBeenCalledTimes(1);
    expect(closed.mock.calls[0]?.[0]).toEqual(new Error("read ECONNRESET"));
  });

  test("reports a plain close without an error", async () => {
    const connection = await connectMqttBroker(broker);
    const client = await mockedClient();
    const closed = vi.fn();
    connection.onClose(closed);

    client.emit("close");

    expect(closed.mock.calls[0]?.[0]).toEqual(
      new Error("Connection closed by broker"),
    );
  });

  test("subscribes and ends through the async client API", async () => {
    const connection = await connectMqttBroker(broker);
    const client = await mockedClient();

    await connection.subscribe("fully/deviceInfo/abc123");
    await connection.end();

    expect(client.subscribeAsync).toHaveBeenCalledWith("fully/deviceInfo/abc123");
    expect(client.endAsync).toHaveBeenCalledTimes(1);
  });
});
