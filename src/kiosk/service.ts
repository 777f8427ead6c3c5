/**
 * Kiosk Module - Service Layer
 *
 * The client a controller talks to: caches device state, sends commands,
 * and runs the MQTT session when the device publishes its state.
 */
import { type Result, err, ok } from "neverthrow";

import {
  formatBrokerConfigError,
  isMqttRequested,
  readMqttEnabled,
  resolveBrokerConfig,
} from "../broker/index.js";
import type { EventDispatcher } from "../events/index.js";
import {
  JsonObjectSchema,
  createEventDispatcher,
  formatEventError,
} from "../events/index.js";
import { createLogger } from "../logger.js";
import type { MqttMessage, SessionState } from "../mqtt/index.js";
import { MqttSession, connectMqttBroker } from "../mqtt/index.js";
import type { CommandParams } from "../transport/index.js";
import { CommandTransport, invalidResponse } from "../transport/index.js";
import type { KioskError } from "./errors.js";
import { formatKioskError, startCancelled } from "./errors.js";
import type {
  ClientHooks,
  ClientOptions,
  ClientOptionsInput,
  DeviceInfo,
  KioskState,
  Settings,
  StartResult,
} from "./schema.js";
import { INITIAL_KIOSK_STATE } from "./schema.js";
import {
  parseClientOptions,
  readDeviceId,
  readReportedIp,
  withDeviceInfo,
  withSettings,
} from "./transform.js";

const log = createLogger("kiosk");

/**
 * Remote control for one Fully Kiosk Browser device.
 *
 * @example
 * const kiosk = new FullyKiosk({
 *   host: "192.168.1.20",
 *   password: "test-secret",
 *   onEvent: (name) => console.log(name),
 * });
 * await kiosk.start();
 * await kiosk.screenOn();
 */
export class FullyKiosk {
  private state: KioskState = INITIAL_KIOSK_STATE;
  private session: MqttSession | null = null;
  private startGeneration = 0;
  private pendingStart: Promise<Result<StartResult, KioskError>> | null = null;
  private readonly options: ClientOptions;
  private readonly hooks: ClientHooks;
  private readonly transport: CommandTransport;
  private readonly dispatch: EventDispatcher;

  /**
   * @throws Error when the options are invalid; use `FullyKiosk.create`
   *   for a Result instead
   */
  constructor(input: ClientOptionsInput) {
    const parsed = parseClientOptions(input);
    if (parsed.isErr()) {
      throw new Error(formatBrokerConfigError(parsed.error));
    }

    this.options = parsed.value;
    this.hooks = {
      onEvent: input.onEvent,
      connectBroker: input.connectBroker,
      onMqttStateChange: input.onMqttStateChange,
    };
    this.transport = new CommandTransport({
      host: this.options.host,
      port: this.options.port,
      useSsl: this.options.useSsl,
      timeoutMs: this.options.requestTimeoutMs,
    });
    this.dispatch = createEventDispatcher({
      onDeviceInfo: (deviceInfo) => {
        this.state = withDeviceInfo(this.state, deviceInfo);
      },
      onEvent: this.hooks.onEvent,
    });
  }

  /**
   * Construct a client, returning invalid options as a CONFIG_ERROR.
   */
  static create(input: ClientOptionsInput): Result<FullyKiosk, KioskError> {
    return parseClientOptions(input).map(() => new FullyKiosk(input));
  }

  // ===========================================================================
  // State Access
  // ===========================================================================

  /**
   * Last device-info document (from REST or MQTT), or null before start.
   */
  get deviceInfo(): DeviceInfo | null {
    return this.state.deviceInfo;
  }

  /**
   * Last settings document, or null before start.
   */
  get settings(): Settings | null {
    return this.state.settings;
  }

  /**
   * Host commands are currently sent to.
   */
  get host(): string {
    return this.transport.host;
  }

  get mqttState(): SessionState {
    return this.session?.state ?? "idle";
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Fetch device info and settings, then start the MQTT session if the
   * device has MQTT enabled and the client was asked to use it.
   *
   * Broker failures after this point are retried in the background and
   * never reported here. A broken broker URL is a CONFIG_ERROR; REST
   * commands keep working either way.
   *
   * Starts run one at a time. A start overtaken by a later `start()` or
   * by `stop()` finishes with START_CANCELLED and launches no session.
   */
  async start(): Promise<Result<StartResult, KioskError>> {
    const generation = ++this.startGeneration;
    const run = this.runStart(generation, this.pendingStart);
    this.pendingStart = run;

    try {
      return await run;
    } finally {
      if (this.pendingStart === run) this.pendingStart = null;
    }
  }

  /**
   * Stop the MQTT session, if one runs. A start still in flight is
   * cancelled and awaited first. Safe to call repeatedly.
   */
  async stop(): Promise<void> {
    this.startGeneration++;

    const pending = this.pendingStart;
    if (pending) await pending;

    await this.stopSession();
  }

  private isSuperseded(generation: number): boolean {
    return generation !== this.startGeneration;
  }

  private async runStart(
    generation: number,
    previous: Promise<Result<StartResult, KioskError>> | null,
  ): Promise<Result<StartResult, KioskError>> {
    if (previous) await previous;
    await this.stopSession();

    if (this.isSuperseded(generation)) {
      return err(startCancelled("superseded before fetching device state"));
    }

    const deviceInfo = await this.getDeviceInfo();
    if (deviceInfo.isErr()) return err(deviceInfo.error);

    const settings = await this.getSettings();
    if (settings.isErr()) return err(settings.error);

    const deviceId = readDeviceId(deviceInfo.value);
    if (deviceId === null) {
      return err(invalidResponse("deviceInfo", "Missing deviceID"));
    }

    if (!isMqttRequested(settings.value, this.options.useMqttIfAvailable)) {
      log.info(
        {
          deviceId,
          mqttEnabled: readMqttEnabled(settings.value),
          useMqttIfAvailable: this.options.useMqttIfAvailable,
        },
        "MQTT not in use, device state must be polled",
      );
      return ok({ usingMqtt: false });
    }

    const broker = resolveBrokerConfig(settings.value, deviceId);
    if (broker.isErr()) {
      log.error(
        { deviceId },
        `MQTT not started: ${formatKioskError(broker.error)}`,
      );
      return err(broker.error);
    }

    if (this.isSuperseded(generation)) {
      log.debug({ deviceId }, "Start superseded, MQTT session not created");
      return err(startCancelled("superseded while fetching device state"));
    }

    log.debug({ deviceId }, "MQTT is enabled");

    this.session = new MqttSession({
      broker: broker.value,
      onMessage: (message) => this.handleMessage(message),
      connect: this.hooks.connectBroker ?? connectMqttBroker,
      reconnectIntervalMs: this.options.reconnectIntervalMs,
      maxReconnectAttempts: this.options.maxReconnectAttempts,
      onStateChange: this.hooks.onMqttStateChange,
    });
    this.session.start();

    return ok({ usingMqtt: true });
  }

  private async stopSession(): Promise<void> {
    const session = this.session;
    if (!session) return;

    try {
      await session.stop();
    } finally {
      this.session = null;
    }
  }

  private handleMessage(message: MqttMessage): void {
    const result = this.dispatch(message.topic, message.payload);
    if (result.isErr()) {
      log.warn({ topic: message.topic }, formatEventError(result.error));
    }
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Send any command and return the decoded JSON body.
   */
  async sendCommand(
    command: string,
    params: CommandParams = {},
  ): Promise<Result<unknown, KioskError>> {
    const result = await this.transport.execute(
      command,
      this.options.password,
      params,
    );
    if (result.isErr()) return err(result.error);

    const response = result.value;
    if (response.kind !== "json") {
      return err(
        invalidResponse(command, `Unexpected ${response.contentType} body`),
      );
    }
    return ok(response.data);
  }

  /**
   * Retrieve device info, cache it, and follow the device to the IP
   * address it reports.
   */
  async getDeviceInfo(): Promise<Result<DeviceInfo, KioskError>> {
    const result = await this.requestDocument("deviceInfo");
    if (result.isErr()) return result;

    const deviceInfo = result.value;
    this.state = withDeviceInfo(this.state, deviceInfo);

    const reportedIp = readReportedIp(deviceInfo);
    if (reportedIp !== null && reportedIp !== this.transport.host) {
      log.info(
        { from: this.transport.host, to: reportedIp },
        "Device IP address changed",
      );
      this.transport.setHost(reportedIp);
    }

    return ok(deviceInfo);
  }

  /**
   * Retrieve and cache the device settings.
   */
  async getSettings(): Promise<Result<Settings, KioskError>> {
    const result = await this.requestDocument("listSettings");
    if (result.isErr()) return result;

    this.state = withSettings(this.state, result.value);
    return ok(result.value);
  }

  async startScreensaver(): Promise<Result<void, KioskError>> {
    return this.command("startScreensaver");
  }

  async stopScreensaver(): Promise<Result<void, KioskError>> {
    return this.command("stopScreensaver");
  }

  async screenOn(): Promise<Result<void, KioskError>> {
    return this.command("screenOn");
  }

  async screenOff(): Promise<Result<void, KioskError>> {
    return this.command("screenOff");
  }

  async setScreenBrightness(
    brightness: number,
  ): Promise<Result<void, KioskError>> {
    return this.setConfigurationString("screenBrightness", brightness);
  }

  /**
   * @param stream - Android audio stream number; device default when omitted
   */
  async setAudioVolume(
    level: number,
    stream?: number,
  ): Promise<Result<void, KioskError>> {
    return this.command("setAudioVolume", { level, stream });
  }

  async restartApp(): Promise<Result<void, KioskError>> {
    return this.command("restartApp");
  }

  async loadStartUrl(): Promise<Result<void, KioskError>> {
    return this.command("loadStartUrl");
  }

  async loadUrl(url: string): Promise<Result<void, KioskError>> {
    return this.command("loadUrl", { url });
  }

  async playSound(
    url: string,
    stream?: number,
  ): Promise<Result<void, KioskError>> {
    return this.command("playSound", { url, stream });
  }

  async stopSound(): Promise<Result<void, KioskError>> {
    return this.command("stopSound");
  }

  async toForeground(): Promise<Result<void, KioskError>> {
    return this.command("toForeground");
  }

  async toBackground(): Promise<Result<void, KioskError>> {
    return this.command("toBackground");
  }

  async startApplication(
    application: string,
  ): Promise<Result<void, KioskError>> {
    return this.command("startApplication", { package: application });
  }

  async setConfigurationString(
    setting: string,
    value: string | number,
  ): Promise<Result<void, KioskError>> {
    return this.command("setStringSetting", { key: setting, value });
  }

  async setConfigurationBool(
    setting: string,
    value: boolean,
  ): Promise<Result<void, KioskError>> {
    return this.command("setBooleanSetting", { key: setting, value });
  }

  async enableLockedMode(): Promise<Result<void, KioskError>> {
    return this.command("enableLockedMode");
  }

  async disableLockedMode(): Promise<Result<void, KioskError>> {
    return this.command("disableLockedMode");
  }

  async lockKiosk(): Promise<Result<void, KioskError>> {
    return this.command("lockKiosk");
  }

  async unlockKiosk(): Promise<Result<void, KioskError>> {
    return this.command("unlockKiosk");
  }

  async enableMotionDetection(): Promise<Result<void, KioskError>> {
    return this.setConfigurationBool("motionDetection", true);
  }

  async disableMotionDetection(): Promise<Result<void, KioskError>> {
    return this.setConfigurationBool("motionDetection", false);
  }

  async triggerMotion(): Promise<Result<void, KioskError>> {
    return this.command("triggerMotion");
  }

  async rebootDevice(): Promise<Result<void, KioskError>> {
    return this.command("rebootDevice");
  }

  async textToSpeech(
    text: string,
    locale?: string,
    engine?: string,
  ): Promise<Result<void, KioskError>> {
    return this.command("textToSpeech", { text, locale, engine });
  }

  async stopTextToSpeech(): Promise<Result<void, KioskError>> {
    return this.command("stopTextToSpeech");
  }

  async clearCache(): Promise<Result<void, KioskError>> {
    return this.command("clearCache");
  }

  async clearWebstorage(): Promise<Result<void, KioskError>> {
    return this.command("clearWebstorage");
  }

  async clearCookies(): Promise<Result<void, KioskError>> {
    return this.command("clearCookies");
  }

  /**
   * Screenshot of the current screen, as image bytes.
   */
  async getScreenshot(): Promise<Result<Uint8Array, KioskError>> {
    return this.requestImage("getScreenshot");
  }

  /**
   * Photo from the front camera, as image bytes.
   */
  async getCamshot(): Promise<Result<Uint8Array, KioskError>> {
    return this.requestImage("getCamshot");
  }

  // ===========================================================================
  // Request Helpers
  // ===========================================================================

  private async command(
    command: string,
    params: CommandParams = {},
  ): Promise<Result<void, KioskError>> {
    const result = await this.sendCommand(command, params);
    return result.map(() => undefined);
  }

  private async requestDocument(
    command: string,
  ): Promise<Result<DeviceInfo, KioskError>> {
    const result = await this.sendCommand(command);
    if (result.isErr()) return err(result.error);

    const parsed = JsonObjectSchema.safeParse(result.value);
    if (!parsed.success) {
      return err(invalidResponse(command, "Expected a JSON object"));
    }
    return ok(parsed.data);
  }

  private async requestImage(
    command: string,
  ): Promise<Result<Uint8Array, KioskError>> {
    const result = await this.transport.execute(
      command,
      this.options.password,
    );
    if (result.isErr()) return err(result.error);

    const response = result.value;
    if (response.kind !== "binary") {
      return err(invalidResponse(command, "Expected image data"));
    }
    return ok(response.data);
  }
}
