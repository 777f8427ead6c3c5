/**
 * MQTT Module - Service Layer
 *
 * Owns the broker session for one device: connects, attaches one listener
 * task per topic filter (plus a catch-all), subscribes, and reconnects
 * after a fixed delay whenever the session fails. Only `stop()` ends the
 * loop, unless a reconnect cap is configured.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { SessionError } from "./errors.js";
import { brokerError, formatSessionError, isAbortError } from "./errors.js";
import type {
  BrokerConnection,
  MqttMessage,
  MqttSessionOptions,
  SessionState,
} from "./schema.js";
import { MessageStream } from "./stream.js";
import { matchingFilters } from "./transform.js";

const log = createLogger("mqtt");

export type ListenerTask = {
  readonly controller: AbortController;
  readonly done: Promise<void>;
};

/**
 * Wait `ms`, or less if `signal` fires first.
 */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Cancel every task and wait for each to finish. Cancellation is expected;
 * the first other failure is rethrown once all tasks are done.
 */
export async function cancelTasks(tasks: Set<ListenerTask>): Promise<void> {
  const failures: unknown[] = [];

  for (const task of tasks) {
    task.controller.abort();
    try {
      await task.done;
    } catch (error) {
      if (!isAbortError(error)) failures.push(error);
    }
  }

  tasks.clear();

  if (failures.length > 0) {
    throw failures[0];
  }
}

/**
 * Listener tasks finish first; the connection closes after, even when a
 * task failed. A failed close is only logged.
 */
export async function closeSession(
  tasks: Set<ListenerTask>,
  connection: BrokerConnection,
): Promise<void> {
  try {
    await cancelTasks(tasks);
  } finally {
    try {
      await connection.end();
    } catch (error) {
      log.warn(
        { error: error instanceof Error ? error.message : String(error) },
        "Error while closing MQTT connection",
      );
    }
  }
}

export class MqttSession {
  private currentState: SessionState = "idle";
  private loop: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private stopping: Promise<void> | null = null;
  private failures = 0;
  private readonly tasks = new Set<ListenerTask>();

  constructor(private readonly options: MqttSessionOptions) {}

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Listener tasks of the live session.
   */
  get activeListeners(): number {
    return this.tasks.size;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start the reconnect loop in the background. Broker failures are logged
   * and retried, never thrown.
   */
  start(): void {
    if (this.loop) {
      log.warn("MQTT session already running");
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.failures = 0;

    const loop = this.run(controller.signal);
    this.loop = loop;

    void loop.catch((error: unknown) => {
      log.error(
        { error: error instanceof Error ? error.message : String(error) },
        "MQTT session loop crashed",
      );
    });
  }

  /**
   * Cancel all listener tasks, close the connection and return to idle.
   * Resolves only after every task has finished; calling it again (or
   * while a stop is in progress) does nothing more.
   */
  async stop(): Promise<void> {
    if (this.stopping) return this.stopping;

    const loop = this.loop;
    const controller = this.controller;
    if (!loop || !controller) return;

    this.stopping = this.shutdown(loop, controller);
    try {
      await this.stopping;
    } finally {
      this.stopping = null;
    }
  }

  private async shutdown(
    loop: Promise<void>,
    controller: AbortController,
  ): Promise<void> {
    log.info("Stopping MQTT session...");
    this.setState("shuttingDown");
    controller.abort();

    try {
      await loop;
    } finally {
      this.loop = null;
      this.controller = null;
      this.setState("idle");
      log.info("MQTT session stopped");
    }
  }

  private setState(state: SessionState): void {
    if (state === this.currentState) return;
    log.debug({ from: this.currentState, to: state }, "Session state changed");
    this.currentState = state;
    this.options.onStateChange?.(state);
  }

  // ===========================================================================
  // Reconnect Loop
  // ===========================================================================

  private async run(signal: AbortSignal): Promise<void> {
    const { reconnectIntervalMs, maxReconnectAttempts } = this.options;

    try {
      while (!signal.aborted) {
        const result = await this.runSession(signal);
        if (result.isOk() || signal.aborted) break;

        this.failures++;
        this.setState("disconnected");

        if (
          maxReconnectAttempts !== undefined &&
          this.failures >= maxReconnectAttempts
        ) {
          log.error(
            { stage: result.error.stage, attempts: this.failures },
            `${formatSessionError(result.error)}. Giving up after ${this.failures} attempts`,
          );
          break;
        }

        log.error(
          { stage: result.error.stage, attempt: this.failures },
          `${formatSessionError(result.error)}. Reconnecting in ${reconnectIntervalMs / 1000}s`,
        );

        await delay(reconnectIntervalMs, signal);
      }
    } finally {
      // Ended on its own (cap reached or crash); a stop resets state itself
      if (!signal.aborted) {
        this.loop = null;
        this.controller = null;
        this.setState("idle");
      }
    }
  }

  /**
   * One connection from connect to teardown.
   *
   * @returns ok when stopped, a BROKER_ERROR when the session failed
   */
  private async runSession(
    signal: AbortSignal,
  ): Promise<Result<void, SessionError>> {
    const { broker } = this.options;

    this.setState("connecting");
    log.info(
      { host: broker.host, port: broker.port, clientId: broker.clientId },
      "Connecting to MQTT broker...",
    );

    let connection: BrokerConnection;
    try {
      connection = await this.options.connect(broker);
    } catch (error) {
      return err(brokerError("connect", error));
    }

    try {
      return await this.listen(connection, signal);
    } finally {
      await closeSession(this.tasks, connection);
    }
  }

  private async listen(
    connection: BrokerConnection,
    signal: AbortSignal,
  ): Promise<Result<void, SessionError>> {
    const { deviceInfoTopic, eventTopic } = this.options.broker;
    const filters = [eventTopic, deviceInfoTopic];

    const closed = new Promise<Error>((resolve) => {
      connection.onClose(resolve);
    });

    // Listeners go in before subscribing: retained messages arrive as soon
    // as the broker acknowledges.
    const streams = new Map(
      filters.map((filter) => [filter, new MessageStream(filter)] as const),
    );
    const unfiltered = new MessageStream("unfiltered");

    connection.onMessage((topic, payload) => {
      const message: MqttMessage = { topic, payload };
      const targets = matchingFilters(filters, topic);

      if (targets.length === 0) {
        unfiltered.push(message);
        return;
      }
      for (const filter of targets) {
        streams.get(filter)?.push(message);
      }
    });

    for (const stream of [...streams.values(), unfiltered]) {
      this.tasks.add(this.spawnListener(stream));
    }

    for (const filter of filters) {
      if (signal.aborted) return ok(undefined);
      try {
        await connection.subscribe(filter);
        log.debug({ topic: filter }, "Subscribed to topic");
      } catch (error) {
        return err(brokerError("subscribe", error));
      }
    }

    this.failures = 0;
    this.setState("subscribed");
    log.info({ topics: filters }, "Listening for device events");

    const lost = await new Promise<Error | null>((resolve) => {
      if (signal.aborted) {
        resolve(null);
        return;
      }

      const onAbort = () => resolve(null);
      signal.addEventListener("abort", onAbort, { once: true });

      void closed.then((error) => {
        signal.removeEventListener("abort", onAbort);
        resolve(error);
      });
    });

    return lost === null ? ok(undefined) : err(brokerError("connection", lost));
  }

  // ===========================================================================
  // Listener Tasks
  // ===========================================================================

  private spawnListener(stream: MessageStream): ListenerTask {
    const controller = new AbortController();
    const done = this.consume(stream, controller.signal);
    return { controller, done };
  }

  private async consume(
    stream: MessageStream,
    signal: AbortSignal,
  ): Promise<void> {
    for await (const message of stream.messages(signal)) {
      log.debug(
        { stream: stream.label, topic: message.topic },
        `MQTT message: ${message.payload.toString("utf8")}`,
      );

      try {
        this.options.onMessage(message);
      } catch (error) {
        log.error(
          {
            topic: message.topic,
            error: error instanceof Error ? error.message : String(error),
          },
          "Message handler threw",
        );
      }
    }
  }
}
